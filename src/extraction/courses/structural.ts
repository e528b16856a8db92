import { Course, PortalProfile } from '../../types/index.js';
import { CheerioAPI, Elements, loadHtml, safeSelect, textOf } from '../../html/document.js';
import { toAbsoluteUrl } from '../../utils/urls.js';
import { logger } from '../../utils/logger.js';
import { dedupeBy } from '../cascade.js';
import { CoursePageInput, CourseStrategy, UNNAMED_COURSE } from './types.js';

export type StructuralCourseConfig = PortalProfile['courses'];

/**
 * Course cards first (the first card selector with matches wins), then bare
 * links inside known list containers.
 */
export class StructuralCourseStrategy implements CourseStrategy {
  readonly name = 'structural';

  constructor(private readonly profile: StructuralCourseConfig) {}

  async extract(input: CoursePageInput): Promise<Course[]> {
    const $ = loadHtml(input.html);

    let cards: Elements | null = null;
    for (const selector of this.profile.cardSelectors) {
      const found = safeSelect($, selector);
      if (found.length > 0) {
        logger.debug(`Found ${found.length} course cards with ${selector}`);
        cards = found;
        break;
      }
    }

    const courses = cards ? this.fromCards($, cards, input) : this.fromContainers($, input);
    return dedupeBy(courses, (course) => course.url);
  }

  private isCourseHref(href: string | undefined): href is string {
    return !!href && href.includes(this.profile.linkPattern);
  }

  private fromCards($: CheerioAPI, cards: Elements, input: CoursePageInput): Course[] {
    const courses: Course[] = [];

    cards.each((_, element) => {
      const card = $(element);
      const link = card
        .find('a[href]')
        .filter((_, a) => this.isCourseHref($(a).attr('href')))
        .first();
      if (link.length === 0) return;

      const url = toAbsoluteUrl(link.attr('href'), input.pageUrl);
      if (!url) return;

      let name = '';
      for (const selector of this.profile.nameSelectors) {
        const nameEl = safeSelect($, selector, card).first();
        if (nameEl.length === 0) continue;
        name = textOf(nameEl) || (nameEl.attr('title') ?? '').trim();
        if (name) break;
      }
      if (!name) name = textOf(link);
      if (!name) name = (card.find('[title]').first().attr('title') ?? '').trim();

      courses.push({ url, name: name || UNNAMED_COURSE });
    });

    return courses;
  }

  private fromContainers($: CheerioAPI, input: CoursePageInput): Course[] {
    const courses: Course[] = [];

    for (const selector of this.profile.containerSelectors) {
      safeSelect($, selector).each((_, container) => {
        $(container)
          .find('a[href]')
          .each((_, a) => {
            const link = $(a);
            const href = link.attr('href');
            if (!this.isCourseHref(href)) return;

            const url = toAbsoluteUrl(href, input.pageUrl);
            if (!url) return;

            let name = textOf(link);
            if (!name) {
              const label = link.closest('[class]').find('span.multiline').first();
              name = label.length > 0 ? textOf(label) : '';
            }
            if (name.length >= 2) {
              courses.push({ url, name });
            }
          });
      });
    }

    return courses;
  }
}
