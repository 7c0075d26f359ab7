import { RenderTimeoutError } from './errors';
import { errorMessage, log } from './logger';
import { poll } from './wait';

export const CONSENT_SELECTORS = [
  'button[title="Hyväksy kaikki"]',
  'button[title="Accept all"]',
];

// Structural slices of Playwright's Page and Frame.
export type ConsentButton = { click(): Promise<void> };
export type ConsentFrame = {
  $(selector: string): Promise<ConsentButton | null>;
  isDetached(): boolean;
};
export type ConsentPage = {
  $(selector: string): Promise<ConsentButton | null>;
  frames(): ConsentFrame[];
};

export type ConsentOptions = {
  /** Selector list; an empty string skips the consent step. */
  selector: string;
  timeoutMs: number;
  intervalMs: number;
};

export type ConsentResult = 'page' | 'iframe' | 'none';

type Found = { button: ConsentButton; where: Exclude<ConsentResult, 'none'> };

// The CMP usually renders its dialog inside an iframe, so every frame is checked on each poll.
async function findButton(page: ConsentPage, selector: string): Promise<Found | null> {
  const onPage = await page.$(selector);
  if (onPage) return { button: onPage, where: 'page' };
  for (const frame of page.frames()) {
    if (frame.isDetached()) continue;
    try {
      const inFrame = await frame.$(selector);
      if (inFrame) return { button: inFrame, where: 'iframe' };
    } catch (err) {
      log(`Skipping frame during consent lookup: ${errorMessage(err)}`);
    }
  }
  return null;
}

/** Clicks the cookie consent button if the dialog shows up within the timeout. */
export async function acceptCookieConsent(page: ConsentPage, opts: ConsentOptions): Promise<ConsentResult> {
  if (!opts.selector) return 'none';
  let found: Found;
  try {
    found = await poll(() => findButton(page, opts.selector), {
      timeoutMs: opts.timeoutMs,
      intervalMs: opts.intervalMs,
      description: 'cookie consent dialog',
    });
  } catch (err) {
    if (!(err instanceof RenderTimeoutError)) throw err;
    log('No cookie consent dialog.');
    return 'none';
  }
  await found.button.click();
  log(`🍪 Accepted cookie consent (${found.where}).`);
  return found.where;
}
