import { Assignment, AssignmentType, Course } from '../../types/index.js';
import { ExtractionStrategy } from '../cascade.js';

export interface CoursePageContent {
  html: string;
  course: Course;
}

export type AssignmentStrategy = ExtractionStrategy<CoursePageContent, Assignment>;

export const DEFAULT_SECTION = 'Main';

const TYPE_KEYWORDS: Array<[string, AssignmentType]> = [
  ['assign', 'assignment'],
  ['quiz', 'quiz'],
  ['forum', 'forum'],
  ['workshop', 'workshop'],
];

/** Activity type from keywords in its URL alone. */
export function inferAssignmentType(url: string, fallback: AssignmentType): AssignmentType {
  const lower = url.toLowerCase();
  for (const [keyword, type] of TYPE_KEYWORDS) {
    if (lower.includes(keyword)) return type;
  }
  return fallback;
}
