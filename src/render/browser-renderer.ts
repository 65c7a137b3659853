import puppeteer from 'puppeteer-core';
import { CaptureError } from '../lib/errors.js';
import { sleep, throwIfAborted } from '../lib/async.js';
import type { Size } from '../types/geometry.js';

export type CaptureRequest = {
  url: string;
  viewport: Size;
  deviceScaleFactor: number;
  /** Settle time after `load`, for fonts, images and scripts to finish. */
  waitMs: number;
  zoom: number;
  selector: string | null;
  timeoutMs: number;
  executablePath?: string;
  signal?: AbortSignal;
};

/** Renders a document and returns one PNG screenshot. */
export type CaptureService = (request: CaptureRequest) => Promise<Buffer>;

export const captureDocument: CaptureService = async ({
  url,
  viewport,
  deviceScaleFactor,
  waitMs,
  zoom,
  selector,
  timeoutMs,
  executablePath,
  signal,
}) => {
  if (!executablePath) {
    throw new CaptureError('No Chrome executable configured. Set CHROME_EXECUTABLE_PATH.');
  }
  throwIfAborted(signal);

  const browser = await puppeteer.launch({
    executablePath,
    headless: true,
    args: ['--no-sandbox', '--disable-setuid-sandbox'],
  });
  try {
    const page = await browser.newPage();
    page.setDefaultTimeout(timeoutMs);
    await page.setViewport({ width: viewport.width, height: viewport.height, deviceScaleFactor });
    await page.goto(url, { waitUntil: 'load', timeout: timeoutMs });
    await sleep(waitMs, signal);

    if (zoom !== 1) {
      await page.evaluate(value => {
        document.body.style.transformOrigin = 'top left';
        document.body.style.setProperty('zoom', String(value));
      }, zoom);
    }
    throwIfAborted(signal);

    if (selector) {
      const element = await page.waitForSelector(selector, { timeout: timeoutMs });
      if (!element) throw new CaptureError(`Selector matched nothing: ${selector}`);
      return Buffer.from(await element.screenshot({ type: 'png' }));
    }
    return Buffer.from(await page.screenshot({ type: 'png', fullPage: true }));
  } catch (err) {
    if (err instanceof Error && err.name === 'TimeoutError') {
      throw new CaptureError(`Timed out after ${timeoutMs}ms capturing ${url}: ${err.message}`, { cause: err });
    }
    throw err;
  } finally {
    await browser.close();
  }
};
