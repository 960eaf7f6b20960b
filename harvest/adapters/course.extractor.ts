import type { CourseYield, RawCourse } from "../adapter.types.js";
import { errorMessage, type PageFetcher } from "../utils/httpHtml.js";
import { parseCoursePage, parseProgramLinks, TOPUNI_BASE, type CourseFields } from "./topuniversities.parse.js";

export type CourseExtractorOptions = {
  fetcher: PageFetcher;
  maxLinks: number;     // hard cap on programme pages considered per university
  targetCount: number;  // stop once this many distinct courses are in hand
  base?: string;
};

export interface CourseExtractor {
  extract(profileHtml: string, universityRef: number, slug: string): Promise<CourseYield>;
}

export function createCourseExtractor(opts: CourseExtractorOptions): CourseExtractor {
  return {
    async extract(profileHtml, universityRef, slug) {
      const links = parseProgramLinks(profileHtml, slug, opts.base ?? TOPUNI_BASE).slice(0, opts.maxLinks);
      console.log(`  Program links discovered: ${links.length}`);

      const courses: RawCourse[] = [];
      const seen = new Set<string>();
      let attempted = 0;

      for (const url of links) {
        if (courses.length >= opts.targetCount) break;
        attempted++;

        const res = await opts.fetcher.fetch(url);
        if (!res.ok) {
          console.warn(`  Skipping course page (${res.reason}): ${url}`);
          continue;
        }

        let fields: CourseFields;
        try {
          fields = parseCoursePage(res.html, url);
        } catch (err) {
          console.warn(`  Failed to parse course page ${url}: ${errorMessage(err)}`);
          continue;
        }

        const key = fields.course_name.toLowerCase();
        if (seen.has(key)) {
          console.log(`  Duplicate course ignored: ${fields.course_name}`);
          continue;
        }
        seen.add(key);
        courses.push({ universityRef, ...fields });
        console.log(`  Added course ${courses.length}: ${fields.course_name}`);
      }

      return { courses, linksFound: links.length, attempted };
    },
  };
}
