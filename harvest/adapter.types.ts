export const SENTINEL = "N/A";
export const TARGET_COUNTRY = "India";
export const MIN_COURSES_PER_UNIVERSITY = 5;

export type UniversityTarget = {
  name: string;
  slug?: string;       // topuniversities path segment, derived from name when absent
  wikiTitle?: string;  // en.wikipedia.org article title, derived from name when absent
};

// Working-set rows. Courses point at their university by position in the
// working set; surrogate ids only exist after finalize.
export type RawUniversity = {
  university_name: string;
  country: string;
  city: string;
  website: string;
};

export type RawCourse = {
  universityRef: number;
  course_name: string;
  level: string;
  discipline: string;
  duration: string;
  fees: string;
  eligibility: string;
};

export type WorkingSet = {
  universities: RawUniversity[];
  courses: RawCourse[];
};

export type UniversityRow = {
  university_id: number;
  university_name: string;
  country: string;
  city: string;
  website: string;
};

export type CourseRow = {
  course_id: number;
  university_id: number;
  course_name: string;
  level: string;
  discipline: string;
  duration: string;
  fees: string;
  eligibility: string;
};

export type HarvestTables = {
  universities: UniversityRow[];
  courses: CourseRow[];
};

export const UNIVERSITY_COLUMNS = [
  "university_id",
  "university_name",
  "country",
  "city",
  "website",
] as const satisfies readonly (keyof UniversityRow)[];

export const COURSE_COLUMNS = [
  "course_id",
  "university_id",
  "course_name",
  "level",
  "discipline",
  "duration",
  "fees",
  "eligibility",
] as const satisfies readonly (keyof CourseRow)[];

export type ResolveResult =
  | { ok: true; university: RawUniversity; slug: string; profileHtml: string }
  | { ok: false; reason: "fetch-failed" | "not-india"; detail: string };

export type CourseYield = {
  courses: RawCourse[];
  linksFound: number;
  attempted: number;
};
