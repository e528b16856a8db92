import { Course } from '../../types/index.js';
import { collapseWhitespace, loadHtml, textOf } from '../../html/document.js';
import { isSameOrigin, pathSegments, toAbsoluteUrl } from '../../utils/urls.js';
import { dedupeBy } from '../cascade.js';
import { CoursePageInput, CourseStrategy } from './types.js';

export const DEFAULT_PATH_KEYWORDS = ['course', 'courses', 'cursos'];

const LABEL_SELECTORS = ['span.multiline', 'span[title]', '[aria-label]', '[title]'];

/**
 * Accepts any same-origin link whose path has a keyword as a whole segment:
 * `/course/view.php?id=3` matches `course`, `/my/?view=course` does not.
 */
export class LinkSegmentStrategy implements CourseStrategy {
  readonly name = 'link-segment';
  private readonly keywords: Set<string>;

  constructor(keywords: string[] = DEFAULT_PATH_KEYWORDS) {
    this.keywords = new Set(keywords.map((k) => k.toLowerCase()));
  }

  matches(url: string): boolean {
    return pathSegments(url).some((segment) => this.keywords.has(segment));
  }

  async extract(input: CoursePageInput): Promise<Course[]> {
    const $ = loadHtml(input.html);
    const courses: Course[] = [];

    $('a[href]').each((_, element) => {
      const link = $(element);
      const url = toAbsoluteUrl(link.attr('href'), input.pageUrl);
      if (!url || !isSameOrigin(url, input.baseUrl) || !this.matches(url)) return;

      let name = textOf(link);
      if (!name) {
        for (const selector of LABEL_SELECTORS) {
          const label = link.find(selector).first();
          const labelText = label.length > 0 ? textOf(label) || label.attr('title') || label.attr('aria-label') : '';
          if (labelText) {
            name = collapseWhitespace(labelText);
            break;
          }
        }
      }
      if (!name) {
        const nearby = link.parent().find('span.multiline, span[title]').first();
        name = nearby.length > 0 ? textOf(nearby) || collapseWhitespace(nearby.attr('title') ?? '') : '';
      }
      if (!name) {
        name = collapseWhitespace(link.attr('aria-label') ?? link.attr('title') ?? '');
      }
      if (!name) return;

      courses.push({ url, name });
    });

    return dedupeBy(courses, (course) => course.url);
  }
}
