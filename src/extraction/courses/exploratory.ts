import { Course, SessionCookie } from '../../types/index.js';
import { loadHtml, pageSnapshot } from '../../html/document.js';
import { LanguageModel } from '../../llm/client.js';
import { buildCoursePagePrompt, parseJsonResponse, toCoursePageVerdict } from '../../llm/prompts.js';
import { BrowserDriver } from '../../scraper/browser.js';
import { isSameOrigin, toAbsoluteUrl } from '../../utils/urls.js';
import { sleep } from '../../utils/async.js';
import { logger } from '../../utils/logger.js';
import { CoursePageInput, CourseStrategy, UNNAMED_COURSE } from './types.js';

const EXCLUDED_PATHS = ['/login', 'logout', '/admin', 'login.php', 'logout.php'];

export interface ExploratoryOptions {
  candidatePatterns: string[];
  maxCandidates: number;
  cookies: SessionCookie[];
  timeoutMs: number;
  requestDelayMs: number;
  maxChars: number;
}

/**
 * Same-origin links matching a candidate pattern, without auth or admin
 * pages, deduplicated and capped at `maxCandidates`.
 */
export function extractCandidateUrls(
  html: string,
  pageUrl: string,
  baseUrl: string,
  patterns: string[],
  maxCandidates: number
): string[] {
  const $ = loadHtml(html);
  const seen = new Set<string>();
  const candidates: string[] = [];

  for (const element of $('a[href]').toArray()) {
    if (candidates.length >= maxCandidates) break;

    const url = toAbsoluteUrl($(element).attr('href'), pageUrl);
    if (!url || seen.has(url) || !isSameOrigin(url, baseUrl)) continue;

    const lower = url.toLowerCase();
    if (EXCLUDED_PATHS.some((excluded) => lower.includes(excluded))) continue;
    if (!patterns.some((pattern) => url.includes(pattern))) continue;

    seen.add(url);
    candidates.push(url);
  }

  return candidates;
}

/**
 * Last resort: open each candidate link and ask the model whether the page
 * is a course. Visits are sequential and bounded by `maxCandidates`.
 */
export class ExploratoryCourseStrategy implements CourseStrategy {
  readonly name = 'exploratory';

  constructor(
    private readonly browser: BrowserDriver,
    private readonly model: LanguageModel,
    private readonly options: ExploratoryOptions
  ) {}

  isAvailable(): Promise<boolean> {
    return this.model.isAvailable();
  }

  async extract(input: CoursePageInput): Promise<Course[]> {
    const candidates = extractCandidateUrls(
      input.html,
      input.pageUrl,
      input.baseUrl,
      this.options.candidatePatterns,
      this.options.maxCandidates
    );
    logger.info(`Exploratory discovery: ${candidates.length} candidate link(s)`);

    const courses: Course[] = [];
    let visited = 0;

    for (const url of candidates) {
      if (visited > 0) await sleep(this.options.requestDelayMs);
      visited++;

      let html: string;
      try {
        html = await this.browser.fetchPage({
          url,
          cookies: this.options.cookies,
          timeoutMs: this.options.timeoutMs,
        });
      } catch (error) {
        logger.debug(`Exploratory discovery: could not visit ${url}: ${error}`);
        continue;
      }

      const output = await this.model.complete(
        buildCoursePagePrompt(pageSnapshot(html, this.options.maxChars), url)
      );
      const verdict = toCoursePageVerdict(parseJsonResponse(output));
      if (verdict?.is_course) {
        const name = verdict.course_name || UNNAMED_COURSE;
        courses.push({ url, name });
        logger.info(`Exploratory discovery: course detected [${name}] ${url}`);
      }
    }

    logger.info(`Exploratory discovery: visited ${visited} page(s), ${courses.length} course(s)`);
    return courses;
  }
}
