export const sleep = (ms: number) => new Promise<void>(r => setTimeout(r, ms));

export type PolitenessConfig = {
  minDelayMs: number;
  maxDelayMs: number;
  userAgents: readonly string[];
  random?: () => number;                 // [0, 1), defaults to Math.random
  wait?: (ms: number) => Promise<void>;  // defaults to sleep
};

export interface Politeness {
  delay(): Promise<void>;
  nextHeaderSet(): Record<string, string>;
}

const BASE_HEADERS = {
  "Accept": "text/html,application/xhtml+xml",
  "Accept-Language": "en-US,en;q=0.9",
};

export function createPoliteness(cfg: PolitenessConfig): Politeness {
  if (!cfg.userAgents.length) throw new Error("politeness needs at least one User-Agent");
  if (cfg.minDelayMs > cfg.maxDelayMs) throw new Error(`delay bounds reversed: ${cfg.minDelayMs} > ${cfg.maxDelayMs}`);

  const random = cfg.random ?? Math.random;
  const wait = cfg.wait ?? sleep;

  return {
    delay() {
      const ms = cfg.minDelayMs + random() * (cfg.maxDelayMs - cfg.minDelayMs);
      return wait(Math.round(ms));
    },
    nextHeaderSet() {
      const idx = Math.min(cfg.userAgents.length - 1, Math.floor(random() * cfg.userAgents.length));
      return { ...BASE_HEADERS, "User-Agent": cfg.userAgents[idx] };
    },
  };
}

/** Zero delay, one header set. For tests and dry runs. */
export function fixedPoliteness(userAgent = "test-agent"): Politeness {
  return {
    delay: async () => {},
    nextHeaderSet: () => ({ ...BASE_HEADERS, "User-Agent": userAgent }),
  };
}
