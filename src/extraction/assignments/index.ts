import { Assignment, PortalProfile } from '../../types/index.js';
import { LanguageModel } from '../../llm/client.js';
import { CascadeResult, runCascade } from '../cascade.js';
import { ClassifierAssignmentStrategy } from './classifier.js';
import { SelectorAssignmentStrategy } from './selector.js';
import { AssignmentStrategy, CoursePageContent } from './types.js';

export { SelectorAssignmentStrategy, ClassifierAssignmentStrategy };
export { inferAssignmentType } from './types.js';
export type { AssignmentStrategy, CoursePageContent };

export interface AssignmentExtractionContext {
  profile: PortalProfile;
  model: LanguageModel;
  maxPageChars: number;
  timeoutMs: number;
  now: () => Date;
}

/**
 * Selector match first, classifier second. With `assignments.useClassifier`
 * off the classifier is left out entirely.
 */
export function buildAssignmentStrategies(context: AssignmentExtractionContext): AssignmentStrategy[] {
  const strategies: AssignmentStrategy[] = [
    new SelectorAssignmentStrategy(context.profile, context.now),
  ];
  if (context.profile.assignments.useClassifier) {
    strategies.push(new ClassifierAssignmentStrategy(context.model, context.maxPageChars));
  }
  return strategies;
}

export function extractAssignments(
  page: CoursePageContent,
  context: AssignmentExtractionContext
): Promise<CascadeResult<Assignment>> {
  return runCascade(buildAssignmentStrategies(context), page, {
    label: page.course.name,
    timeoutMs: context.timeoutMs,
  });
}
