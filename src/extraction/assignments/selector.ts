import { Assignment, PortalProfile } from '../../types/index.js';
import { CheerioAPI, Nodes, loadHtml, safeSelect, textOf } from '../../html/document.js';
import { extractDateFromText } from '../../dates/normalizer.js';
import { detectSubmissionStatus } from '../../dates/submission.js';
import { toAbsoluteUrl } from '../../utils/urls.js';
import { dedupeBy } from '../cascade.js';
import { AssignmentStrategy, CoursePageContent, DEFAULT_SECTION, inferAssignmentType } from './types.js';

export type SelectorAssignmentConfig = Pick<
  PortalProfile,
  'assignments' | 'dates' | 'submission' | 'sections'
>;

const MIN_TITLE_LENGTH = 3;
const MAX_CONTEXT_DEPTH = 3;

/**
 * Activity links matched by the profile's per-type selectors. Due date and
 * submission state come from the text around each link.
 */
export class SelectorAssignmentStrategy implements AssignmentStrategy {
  readonly name = 'selector';

  constructor(
    private readonly profile: SelectorAssignmentConfig,
    private readonly now: () => Date = () => new Date()
  ) {}

  get selectors(): string[] {
    return this.profile.assignments.types.flatMap((type) => type.selectors);
  }

  async extract(input: CoursePageContent): Promise<Assignment[]> {
    const $ = loadHtml(input.html);
    const assignments: Assignment[] = [];
    const seen = new Set<string>();

    for (const selector of this.selectors) {
      safeSelect($, selector).each((_, element) => {
        const link = $(element);
        const url = toAbsoluteUrl(link.attr('href'), input.course.url);
        if (!url || seen.has(url)) return;

        const title = textOf(link);
        if (title.length < MIN_TITLE_LENGTH) return;
        seen.add(url);

        const context = this.contextOf($, link);
        const contextText = textOf(context);

        assignments.push({
          title,
          rawDueDate: this.findDueDate($, context, contextText),
          course: input.course.name,
          type: inferAssignmentType(url, 'activity'),
          url,
          section: this.sectionOf(link),
          submissionStatus: detectSubmissionStatus(
            contextText,
            this.profile.submission.submittedKeywords,
            this.now()
          ),
        });
      });
    }

    return dedupeBy(assignments, (assignment) => assignment.url);
  }

  /**
   * Climb from the link while the ancestor still holds a single activity,
   * so a date from a neighbouring activity is never picked up.
   */
  private contextOf($: CheerioAPI, link: Nodes): Nodes {
    let context = link.parent();
    for (let depth = 1; depth < MAX_CONTEXT_DEPTH; depth++) {
      const next = context.parent();
      if (next.length === 0 || this.activityLinkCount($, next) > 1) break;
      context = next;
    }
    return context;
  }

  private activityLinkCount($: CheerioAPI, scope: Nodes): number {
    const urls = new Set<string>();
    for (const selector of this.selectors) {
      safeSelect($, selector, scope).each((_, el) => {
        const href = $(el).attr('href');
        if (href) urls.add(href);
      });
    }
    return urls.size;
  }

  private findDueDate($: CheerioAPI, context: Nodes, contextText: string): string {
    const fromText = extractDateFromText(contextText, this.profile.dates.patterns);
    if (fromText) return fromText;

    for (const selector of this.profile.dates.selectors) {
      const dateEl = safeSelect($, selector, context).first();
      if (dateEl.length > 0) {
        const text = textOf(dateEl);
        if (text) return text;
      }
    }
    return '';
  }

  private sectionOf(link: Nodes): string {
    try {
      const section = link.closest(this.profile.sections.selector);
      if (section.length === 0) return DEFAULT_SECTION;
      const heading = section.find(this.profile.sections.nameSelector).first();
      return textOf(heading) || DEFAULT_SECTION;
    } catch {
      return DEFAULT_SECTION;
    }
  }
}
