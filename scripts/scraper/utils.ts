export const sleep = (ms: number) => new Promise<void>((res) => setTimeout(res, ms));

// Collapses runs of whitespace (including nbsp) and trims.
export const cleanText = (text: string): string => text.replace(/\s+/g, ' ').trim();

export function withPageParam(baseUrl: string, param: string, page: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set(param, String(page));
  return url.toString();
}

export function resolveUrl(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}
