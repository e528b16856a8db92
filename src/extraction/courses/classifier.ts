import { Course } from '../../types/index.js';
import { pageSnapshot } from '../../html/document.js';
import { LanguageModel } from '../../llm/client.js';
import { buildCourseListPrompt, parseJsonResponse, toCourseListItems } from '../../llm/prompts.js';
import { toAbsoluteUrl } from '../../utils/urls.js';
import { logger } from '../../utils/logger.js';
import { dedupeBy } from '../cascade.js';
import { CoursePageInput, CourseStrategy, UNNAMED_COURSE } from './types.js';

export interface ClassifierCourseOptions {
  linkPattern: string;
  /** A URL with one of these path segments is also accepted as a course link. */
  pathKeywords: string[];
  maxChars: number;
}

export class ClassifierCourseStrategy implements CourseStrategy {
  readonly name = 'classifier';

  constructor(
    private readonly model: LanguageModel,
    private readonly options: ClassifierCourseOptions
  ) {}

  isAvailable(): Promise<boolean> {
    return this.model.isAvailable();
  }

  looksLikeCourseUrl(url: string): boolean {
    if (url.includes(this.options.linkPattern)) return true;
    const lower = url.toLowerCase();
    return this.options.pathKeywords.some((keyword) => lower.includes(`/${keyword.toLowerCase()}/`));
  }

  async extract(input: CoursePageInput): Promise<Course[]> {
    const snippet = pageSnapshot(input.html, this.options.maxChars);
    if (!snippet) return [];

    const output = await this.model.complete(
      buildCourseListPrompt(snippet, input.baseUrl, this.options.linkPattern)
    );
    const items = toCourseListItems(parseJsonResponse(output));
    if (items.length === 0) {
      logger.debug('Classifier returned no parseable course list');
      return [];
    }

    const courses: Course[] = [];
    for (const item of items) {
      const url = toAbsoluteUrl(item.url, input.baseUrl);
      if (!url || !this.looksLikeCourseUrl(url)) continue;
      courses.push({ url, name: item.name || UNNAMED_COURSE });
    }
    return dedupeBy(courses, (course) => course.url);
  }
}
