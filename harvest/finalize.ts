import {
  COURSE_COLUMNS,
  SENTINEL,
  TARGET_COUNTRY,
  UNIVERSITY_COLUMNS,
  type CourseRow,
  type HarvestTables,
  type UniversityRow,
  type WorkingSet,
} from "./adapter.types.js";
import { cleanText, dedupe, smartTitleCase } from "./utils/text.js";

/** A finalized table broke one of its invariants. Never recoverable: nothing gets written. */
export class IntegrityViolation extends Error {
  constructor(public readonly invariant: string, detail: string) {
    super(`${invariant}: ${detail}`);
    this.name = "IntegrityViolation";
  }
}

const isIndia = (country: string) => country.toLowerCase() === TARGET_COUNTRY.toLowerCase();

function assertDenseIds(ids: number[], table: string) {
  ids.forEach((id, i) => {
    if (!Number.isInteger(id) || id < 1) {
      throw new IntegrityViolation(`${table}.id-positive`, `row ${i} has id ${String(id)}`);
    }
    if (id !== i + 1) {
      throw new IntegrityViolation(`${table}.id-contiguous`, `row ${i} has id ${id}, expected ${i + 1}`);
    }
  });
}

function assertFilled<T extends Record<string, string | number>>(rows: T[], columns: readonly (keyof T)[], table: string) {
  rows.forEach((row, i) => {
    for (const col of columns) {
      const v = row[col];
      if (v === null || v === undefined || (typeof v === "string" && !v.trim())) {
        throw new IntegrityViolation(`${table}.no-empty-fields`, `row ${i} has empty ${String(col)}`);
      }
    }
  });
}

/** Checks every invariant the workbook consumers rely on; throws on the first one broken. */
export function assertIntegrity(tables: HarvestTables) {
  const { universities, courses } = tables;

  assertDenseIds(universities.map(u => u.university_id), "universities");
  assertDenseIds(courses.map(c => c.course_id), "courses");
  assertFilled(universities, UNIVERSITY_COLUMNS, "universities");
  assertFilled(courses, COURSE_COLUMNS, "courses");

  const names = new Set<string>();
  for (const u of universities) {
    if (!isIndia(u.country)) {
      throw new IntegrityViolation("universities.country-india", `${u.university_name} is in ${u.country}`);
    }
    const key = u.university_name.toLowerCase();
    if (names.has(key)) throw new IntegrityViolation("universities.unique-name", u.university_name);
    names.add(key);
  }

  const ids = new Set(universities.map(u => u.university_id));
  const courseKeys = new Set<string>();
  for (const c of courses) {
    if (!ids.has(c.university_id)) {
      throw new IntegrityViolation("courses.university-fk", `course ${c.course_id} points at missing university ${c.university_id}`);
    }
    const key = `${c.university_id}|${c.course_name.toLowerCase()}`;
    if (courseKeys.has(key)) throw new IntegrityViolation("courses.unique-name", `course ${c.course_id} repeats ${c.course_name}`);
    courseKeys.add(key);
  }
}

/**
 * Turns the scrape-time working set into the two exported tables: cleans,
 * dedupes, assigns surrogate ids, drops orphaned courses and then checks the
 * result with assertIntegrity.
 */
export function finalize(ws: WorkingSet): HarvestTables {
  const cleaned = ws.universities.map((u, ref) => {
    const country = smartTitleCase(u.country);
    const website = cleanText(u.website);
    return {
      ref,
      university_name: cleanText(u.university_name),
      country: isIndia(country) ? TARGET_COUNTRY : country,
      city: smartTitleCase(u.city),
      website: /^https?:\/\//i.test(website) ? website : SENTINEL,
    };
  });

  const kept = dedupe(cleaned.filter(u => isIndia(u.country)), u => u.university_name.toLowerCase());

  const idByRef = new Map<number, number>();
  const universities: UniversityRow[] = kept.map(({ ref, ...u }, i) => {
    idByRef.set(ref, i + 1);
    return { university_id: i + 1, ...u };
  });

  const linked = ws.courses.flatMap(c => {
    const university_id = idByRef.get(c.universityRef);
    if (university_id === undefined) return [];
    return [{
      university_id,
      course_name: cleanText(c.course_name),
      level: cleanText(c.level),
      discipline: smartTitleCase(c.discipline),
      duration: cleanText(c.duration),
      fees: cleanText(c.fees),
      eligibility: cleanText(c.eligibility),
    }];
  });

  const courses: CourseRow[] = dedupe(linked, c => `${c.university_id}|${c.course_name.toLowerCase()}`)
    .map((c, i) => ({ course_id: i + 1, ...c }));

  const tables = { universities, courses };
  assertIntegrity(tables);
  return tables;
}
