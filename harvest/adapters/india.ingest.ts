import {
  MIN_COURSES_PER_UNIVERSITY,
  TARGET_COUNTRY,
  type HarvestTables,
  type UniversityTarget,
  type WorkingSet,
} from "../adapter.types.js";
import type { HarvestConfig } from "../config.js";
import { finalize } from "../finalize.js";
import { emitWorkbook } from "../utils/emitter.js";
import { createPageFetcher, type PageFetcher } from "../utils/httpHtml.js";
import { createPoliteness } from "../utils/politeness.js";
import { createCourseExtractor, type CourseExtractor } from "./course.extractor.js";
import { resolveTargets } from "./india.seed.js";
import { createUniversityResolver, type UniversityResolver } from "./university.resolver.js";

/**
 * Scrape phase. Strictly sequential: one university at a time, one page at a
 * time. Only this loop appends to the working set.
 */
export async function collect(
  targets: UniversityTarget[],
  resolver: UniversityResolver,
  extractor: CourseExtractor,
): Promise<WorkingSet> {
  const ws: WorkingSet = { universities: [], courses: [] };

  for (const [i, target] of targets.entries()) {
    console.log(`\nScraping university ${i + 1}/${targets.length}: ${target.name}`);

    const resolved = await resolver.resolve(target);
    if (!resolved.ok) {
      console.warn(`  Skipping ${target.name} (${resolved.reason}): ${resolved.detail}`);
      continue;
    }

    const ref = ws.universities.length;
    ws.universities.push(resolved.university);
    console.log(`  University captured: ${resolved.university.university_name} (${resolved.university.country})`);

    const { courses } = await extractor.extract(resolved.profileHtml, ref, resolved.slug);
    ws.courses.push(...courses);

    if (courses.length < MIN_COURSES_PER_UNIVERSITY) {
      console.warn(`  Warning: only ${courses.length} courses were captured for ${resolved.university.university_name}.`);
    }
  }

  return ws;
}

export type IngestDeps = {
  fetcher?: PageFetcher;
  targets?: UniversityTarget[];
  write?: (outPath: string, tables: HarvestTables) => void;
};

export type IngestOutcome =
  | { written: true; outputFile: string; tables: HarvestTables }
  | { written: false; reason: string };

export async function ingestIndia(config: HarvestConfig, deps: IngestDeps = {}): Promise<IngestOutcome> {
  const fetcher = deps.fetcher ?? createPageFetcher({
    politeness: createPoliteness({
      minDelayMs: config.minDelayMs,
      maxDelayMs: config.maxDelayMs,
      userAgents: config.userAgents,
    }),
    timeoutMs: config.timeoutMs,
    cacheDir: config.cacheDir,
    cacheTtlHours: config.cacheTtlHours,
  });
  const targets = deps.targets ?? resolveTargets(config.targetNames);
  const write = deps.write ?? emitWorkbook;

  console.log(`Starting university and course scraping pipeline for ${TARGET_COUNTRY} (${targets.length} targets)...`);

  const ws = await collect(
    targets,
    createUniversityResolver({ fetcher, fetchAttempts: config.fetchAttempts }),
    createCourseExtractor({ fetcher, maxLinks: config.maxCourseLinks, targetCount: config.targetCourses }),
  );

  // IntegrityViolation propagates from here; nothing is written in that case.
  const tables = finalize(ws);

  if (!tables.universities.length) {
    console.warn("No university data was collected. Excel file was not created.");
    return { written: false, reason: "no universities" };
  }
  if (!tables.courses.length) {
    console.warn("No course data was collected. Excel file was not created.");
    return { written: false, reason: "no courses" };
  }

  write(config.outputFile, tables);

  console.log("\nScraping completed successfully.");
  console.log(`Universities exported: ${tables.universities.length}`);
  console.log(`Courses exported: ${tables.courses.length}`);
  console.log(`Output file: ${config.outputFile}`);
  return { written: true, outputFile: config.outputFile, tables };
}
