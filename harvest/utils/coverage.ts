import { MIN_COURSES_PER_UNIVERSITY, type HarvestTables } from "../adapter.types.js";
import { isSentinel } from "./text.js";

export type CoverageReport = {
  universityCount: number;
  courseCount: number;
  minCoursesPerUniversity: number;
  maxCoursesPerUniversity: number;
  universitiesBelowTarget: number;
  orphanCourses: number;
  pctUniversitiesWithWebsite: number;
  pctUniversitiesWithCity: number;
  pctCoursesWithFees: number;
  pctCoursesWithDuration: number;
  pctCoursesWithEligibility: number;
};

function pct(part: number, whole: number) {
  return whole ? Number(((part / whole) * 100).toFixed(1)) : 0;
}

export function computeCoverage({ universities, courses }: HarvestTables): CoverageReport {
  const perUniversity = new Map<number, number>(universities.map(u => [u.university_id, 0]));
  let orphanCourses = 0;
  for (const c of courses) {
    const n = perUniversity.get(c.university_id);
    if (n === undefined) orphanCourses++;
    else perUniversity.set(c.university_id, n + 1);
  }
  const counts = [...perUniversity.values()];
  const known = (values: string[]) => values.filter(v => !isSentinel(v)).length;

  return {
    universityCount: universities.length,
    courseCount: courses.length,
    minCoursesPerUniversity: counts.length ? Math.min(...counts) : 0,
    maxCoursesPerUniversity: counts.length ? Math.max(...counts) : 0,
    universitiesBelowTarget: counts.filter(n => n < MIN_COURSES_PER_UNIVERSITY).length,
    orphanCourses,
    pctUniversitiesWithWebsite: pct(known(universities.map(u => u.website)), universities.length),
    pctUniversitiesWithCity: pct(known(universities.map(u => u.city)), universities.length),
    pctCoursesWithFees: pct(known(courses.map(c => c.fees)), courses.length),
    pctCoursesWithDuration: pct(known(courses.map(c => c.duration)), courses.length),
    pctCoursesWithEligibility: pct(known(courses.map(c => c.eligibility)), courses.length),
  };
}
