import { z } from "zod";

export const DEFAULT_USER_AGENTS = [
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36",
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.1 Safari/605.1.15",
  "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36",
];

const csv = z
  .string()
  .default("")
  .transform((v) => v.split(",").map((s) => s.trim()).filter(Boolean));

const schema = z
  .object({
    OUTPUT_FILE: z.string().min(1).default("university_courses.xlsx"),
    RATE_MIN_MS: z.coerce.number().int().nonnegative().default(1000),
    RATE_MAX_MS: z.coerce.number().int().nonnegative().default(3000),
    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    FETCH_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    CACHE_HTML_DIR: z.string().default("./cache/html"),
    CACHE_TTL_HOURS: z.coerce.number().nonnegative().default(24),
    MAX_COURSE_LINKS: z.coerce.number().int().positive().default(40),
    TARGET_COURSES: z.coerce.number().int().positive().default(5),
    HTTP_USER_AGENT: z.string().optional(),
    INDIA_TARGETS: csv,
  })
  .refine((c) => c.RATE_MIN_MS <= c.RATE_MAX_MS, {
    message: "RATE_MIN_MS must not exceed RATE_MAX_MS",
    path: ["RATE_MIN_MS"],
  });

export type HarvestConfig = {
  outputFile: string;
  minDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  fetchAttempts: number;
  cacheDir: string | null;
  cacheTtlHours: number;
  maxCourseLinks: number;
  targetCourses: number;
  userAgents: string[];
  targetNames: string[];
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HarvestConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  const c = parsed.data;
  return {
    outputFile: c.OUTPUT_FILE,
    minDelayMs: c.RATE_MIN_MS,
    maxDelayMs: c.RATE_MAX_MS,
    timeoutMs: c.HTTP_TIMEOUT_MS,
    fetchAttempts: c.FETCH_ATTEMPTS,
    cacheDir: c.CACHE_HTML_DIR.trim() || null,
    cacheTtlHours: c.CACHE_TTL_HOURS,
    maxCourseLinks: c.MAX_COURSE_LINKS,
    targetCourses: c.TARGET_COURSES,
    userAgents: c.HTTP_USER_AGENT ? [c.HTTP_USER_AGENT, ...DEFAULT_USER_AGENTS] : DEFAULT_USER_AGENTS,
    targetNames: c.INDIA_TARGETS,
  };
}
