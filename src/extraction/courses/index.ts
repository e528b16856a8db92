import { Course, CourseStrategyName, PortalProfile, SessionCookie } from '../../types/index.js';
import { LanguageModel } from '../../llm/client.js';
import { BrowserDriver } from '../../scraper/browser.js';
import { CascadeResult, runCascade } from '../cascade.js';
import { ClassifierCourseStrategy } from './classifier.js';
import { ExploratoryCourseStrategy } from './exploratory.js';
import { LinkSegmentStrategy } from './linkSegment.js';
import { StructuralCourseStrategy } from './structural.js';
import { CoursePageInput, CourseStrategy } from './types.js';

export { LinkSegmentStrategy, StructuralCourseStrategy, ClassifierCourseStrategy, ExploratoryCourseStrategy };
export type { CoursePageInput, CourseStrategy };

export const DEFAULT_COURSE_ORDER: CourseStrategyName[] = [
  'link-segment',
  'structural',
  'classifier',
  'exploratory',
];

export interface CourseDiscoveryContext {
  profile: PortalProfile;
  model: LanguageModel;
  browser: BrowserDriver;
  cookies: SessionCookie[];
  timeoutMs: number;
  requestDelayMs: number;
  maxCourseChars: number;
  maxPageChars: number;
}

/** Instantiate the course strategies in the profile's priority order. */
export function buildCourseStrategies(context: CourseDiscoveryContext): CourseStrategy[] {
  const { profile } = context;
  const discovery = profile.courseDiscovery;
  const order = discovery.order.length > 0 ? discovery.order : DEFAULT_COURSE_ORDER;

  const factories: Record<CourseStrategyName, () => CourseStrategy> = {
    'link-segment': () => new LinkSegmentStrategy(discovery.pathKeywords),
    structural: () => new StructuralCourseStrategy(profile.courses),
    classifier: () =>
      new ClassifierCourseStrategy(context.model, {
        linkPattern: profile.courses.linkPattern,
        pathKeywords: discovery.pathKeywords,
        maxChars: context.maxCourseChars,
      }),
    exploratory: () =>
      new ExploratoryCourseStrategy(context.browser, context.model, {
        candidatePatterns: discovery.candidatePatterns,
        maxCandidates: discovery.maxCandidates,
        cookies: context.cookies,
        timeoutMs: Math.min(context.timeoutMs, 15000),
        requestDelayMs: context.requestDelayMs,
        maxChars: context.maxPageChars,
      }),
  };

  const seen = new Set<CourseStrategyName>();
  return order
    .filter((name) => {
      if (seen.has(name)) return false;
      seen.add(name);
      return true;
    })
    .map((name) => factories[name]());
}

export function discoverCourses(
  input: CoursePageInput,
  context: CourseDiscoveryContext
): Promise<CascadeResult<Course>> {
  return runCascade(buildCourseStrategies(context), input, { label: 'courses' });
}
