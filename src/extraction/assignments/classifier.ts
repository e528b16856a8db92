import { Assignment } from '../../types/index.js';
import { pageSnapshot } from '../../html/document.js';
import { LanguageModel } from '../../llm/client.js';
import { buildAssignmentPrompt, parseJsonResponse, toAssignmentItems } from '../../llm/prompts.js';
import { NOT_SUBMITTED } from '../../dates/submission.js';
import { toAbsoluteUrl } from '../../utils/urls.js';
import { dedupeBy } from '../cascade.js';
import { AssignmentStrategy, CoursePageContent, DEFAULT_SECTION, inferAssignmentType } from './types.js';

export class ClassifierAssignmentStrategy implements AssignmentStrategy {
  readonly name = 'classifier';

  constructor(
    private readonly model: LanguageModel,
    private readonly maxChars: number
  ) {}

  isAvailable(): Promise<boolean> {
    return this.model.isAvailable();
  }

  async extract(input: CoursePageContent): Promise<Assignment[]> {
    const snippet = pageSnapshot(input.html, this.maxChars);
    if (!snippet) return [];

    const output = await this.model.complete(buildAssignmentPrompt(snippet, input.course.name));
    const assignments: Assignment[] = [];

    for (const item of toAssignmentItems(parseJsonResponse(output))) {
      const url = toAbsoluteUrl(item.url, input.course.url);
      if (!item.title || !url) continue;

      assignments.push({
        title: item.title,
        rawDueDate: item.due_date,
        course: input.course.name,
        // The model's own type label is not trusted; the URL decides
        type: inferAssignmentType(url, 'assignment'),
        url,
        section: DEFAULT_SECTION,
        submissionStatus: { ...NOT_SUBMITTED },
      });
    }

    return dedupeBy(assignments, (assignment) => assignment.url);
  }
}
