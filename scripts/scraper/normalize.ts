/**
 * Turns a locale-formatted number ("350 000 €", "45,5 m²") into a plain
 * numeric string ("350000", "45.5"). Never throws; no digits yields "".
 */
export function normalize(raw: string, unitMarker?: string): string {
  let value = raw;
  if (unitMarker) {
    const idx = value.indexOf(unitMarker);
    if (idx !== -1) value = value.slice(0, idx);
  }
  return value.replace(/[^\d.,]/g, '').replace(/,/g, '.');
}
