import UserAgent from "user-agents";

export const DEFAULT_USER_AGENTS: readonly string[] = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 13_1) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.1 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
];

const generateUserAgent = () =>
  new UserAgent({ deviceCategory: "desktop" }).toString();

/**
 * Build the pool a session rotates through. The pool is fixed for the
 * lifetime of the session; `generated` appends that many desktop agents on
 * top of the defaults.
 */
export const buildUserAgentPool = (generated = 0): readonly string[] => {
  const pool = [...DEFAULT_USER_AGENTS];
  for (let i = 0; i < generated; i += 1) {
    pool.push(generateUserAgent());
  }
  return Object.freeze(pool);
};

export const pickUserAgent = (
  pool: readonly string[],
  random: () => number = Math.random,
): string => {
  if (pool.length === 0) {
    throw new RangeError("User agent pool is empty");
  }
  const index = Math.min(pool.length - 1, Math.floor(random() * pool.length));
  return pool[index] ?? pool[0];
};
