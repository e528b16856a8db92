import { Course } from '../../types/index.js';
import { ExtractionStrategy } from '../cascade.js';

export interface CoursePageInput {
  /** Rendered HTML of the course-listing page. */
  html: string;
  /** URL the HTML was fetched from; relative links resolve against it. */
  pageUrl: string;
  /** Portal origin; only links on this origin are considered. */
  baseUrl: string;
}

export type CourseStrategy = ExtractionStrategy<CoursePageInput, Course>;

export const UNNAMED_COURSE = 'Untitled course';
