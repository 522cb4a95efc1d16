/** The slice of a Playwright `Page` the settling loop drives. */
export interface ScrollablePage {
  evaluate<R>(pageFunction: () => R): Promise<R>;
  waitForTimeout(timeout: number): Promise<void>;
}

export interface SettleOptions {
  pauseMs?: number;
  maxIterations?: number;
}

export interface SettleReport {
  iterations: number;
  initialHeight: number;
  finalHeight: number;
  reason: "stable" | "max-iterations";
}

const measureHeight = (page: ScrollablePage): Promise<number> =>
  page.evaluate(() => document.body?.scrollHeight ?? 0);

/**
 * Surface lazily loaded content by scrolling one viewport at a time until
 * the document stops growing.
 *
 * A height that shrinks counts as stable: content that collapses and grows
 * again later is cut off at the collapse.
 */
export const settleLazyContent = async (
  page: ScrollablePage,
  options: SettleOptions = {},
): Promise<SettleReport> => {
  const pauseMs = options.pauseMs ?? 1_000;
  const maxIterations = options.maxIterations ?? 30;

  const initialHeight = await measureHeight(page);
  let lastHeight = initialHeight;

  for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
    await page.evaluate(() => window.scrollBy(0, window.innerHeight));
    await page.waitForTimeout(pauseMs);
    const nextHeight = await measureHeight(page);

    if (nextHeight <= lastHeight) {
      return {
        iterations: iteration,
        initialHeight,
        finalHeight: nextHeight,
        reason: "stable",
      };
    }
    lastHeight = nextHeight;
  }

  return {
    iterations: maxIterations,
    initialHeight,
    finalHeight: lastHeight,
    reason: "max-iterations",
  };
};
