import * as XLSX from "xlsx";
import { z } from "zod";
import { writeFileSync, readFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import {
  COURSE_COLUMNS,
  UNIVERSITY_COLUMNS,
  type CourseRow,
  type HarvestTables,
  type UniversityRow,
} from "../adapter.types.js";

export const UNIVERSITIES_SHEET = "Universities";
export const COURSES_SHEET = "Courses";

export function ensureDir(p: string) {
  mkdirSync(p, { recursive: true });
}

export function buildWorkbook(tables: HarvestTables): XLSX.WorkBook {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet<UniversityRow>(tables.universities, { header: [...UNIVERSITY_COLUMNS] }),
    UNIVERSITIES_SHEET,
  );
  XLSX.utils.book_append_sheet(
    wb,
    XLSX.utils.json_to_sheet<CourseRow>(tables.courses, { header: [...COURSE_COLUMNS] }),
    COURSES_SHEET,
  );
  return wb;
}

export function emitWorkbook(outPath: string, tables: HarvestTables) {
  ensureDir(dirname(outPath));
  const buf: Buffer = XLSX.write(buildWorkbook(tables), { type: "buffer", bookType: "xlsx" });
  writeFileSync(outPath, buf);
}

const universityRow = z.object({
  university_id: z.coerce.number().int(),
  university_name: z.coerce.string(),
  country: z.coerce.string(),
  city: z.coerce.string(),
  website: z.coerce.string(),
});

const courseRow = z.object({
  course_id: z.coerce.number().int(),
  university_id: z.coerce.number().int(),
  course_name: z.coerce.string(),
  level: z.coerce.string(),
  discipline: z.coerce.string(),
  duration: z.coerce.string(),
  fees: z.coerce.string(),
  eligibility: z.coerce.string(),
});

function sheetRows(wb: XLSX.WorkBook, name: string): unknown[] {
  const sheet = wb.Sheets[name];
  if (!sheet) throw new Error(`workbook has no "${name}" sheet`);
  return XLSX.utils.sheet_to_json(sheet, { defval: "" });
}

export function parseWorkbook(wb: XLSX.WorkBook): HarvestTables {
  return {
    universities: z.array(universityRow).parse(sheetRows(wb, UNIVERSITIES_SHEET)),
    courses: z.array(courseRow).parse(sheetRows(wb, COURSES_SHEET)),
  };
}

export function readWorkbook(p: string): HarvestTables {
  return parseWorkbook(XLSX.read(readFileSync(p), { type: "buffer" }));
}
