import dayjs from 'dayjs';
import {
  Assignment,
  Classification,
  ClassifiedAssignment,
  Course,
  DateWindow,
} from '../types/index.js';
import { formatIsoDate } from '../dates/normalizer.js';
import { RECENT_SUBMISSION_DAYS } from '../dates/submission.js';
import { TemplateContext, renderTemplate } from './template.js';

export const EMPTY_MESSAGE = '## No pending items in this period.';
export const NO_COURSES_MESSAGE = 'No courses were found.';
export const FOOTER = '*Report generated by lms-report*';

export interface ReportMetadata {
  title: string;
  generatedAt: Date;
  window: DateWindow;
}

function section(lines: string[]): string {
  return `${lines.join('\n')}\n\n`;
}

function headline(assignment: Assignment): string {
  return `- **${assignment.title}** in **${assignment.course}**`;
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`;
}

export function buildCoursesExploredSection(courses: Course[]): string {
  const lines = ['## Courses explored', ''];
  if (courses.length === 0) {
    lines.push(NO_COURSES_MESSAGE);
  } else {
    for (const course of courses) {
      lines.push(`- ${course.name}`);
    }
  }
  return section(lines);
}

export function buildRecentlySubmittedSection(items: Assignment[]): string {
  if (items.length === 0) return '';
  const lines = [`## Recently submitted (last ${RECENT_SUBMISSION_DAYS} days)`, ''];
  for (const a of items) {
    lines.push(headline(a), `  - *Status:* ${a.submissionStatus.statusText}`, `  - *URL:* ${a.url}`);
  }
  return section(lines);
}

export function buildOverdueSection(items: ClassifiedAssignment[]): string {
  if (items.length === 0) return '';
  const lines = ['## Overdue', ''];
  for (const a of items) {
    lines.push(
      headline(a),
      `  - *Due:* ${formatIsoDate(a.normalizedDueDate)}`,
      `  - *Overdue by:* ${plural(a.daysOverdue ?? 0, 'day')}`,
      `  - *URL:* ${a.url}`
    );
  }
  return section(lines);
}

export function buildDueTodaySection(items: ClassifiedAssignment[]): string {
  if (items.length === 0) return '';
  const lines = ['## Due today', ''];
  for (const a of items) {
    lines.push(headline(a), `  - *URL:* ${a.url}`);
  }
  return section(lines);
}

export function buildUpcomingSection(items: ClassifiedAssignment[]): string {
  if (items.length === 0) return '';
  const lines = ['## Upcoming', ''];
  for (const a of items) {
    lines.push(
      headline(a),
      `  - *Due:* ${formatIsoDate(a.normalizedDueDate)}`,
      `  - *Due in:* ${plural(a.daysUntilDue ?? 0, 'day')}`,
      `  - *URL:* ${a.url}`
    );
  }
  return section(lines);
}

export function describeWindow(window: DateWindow): string {
  return `Last ${plural(window.daysBehind, 'day')} and next ${plural(window.daysAhead, 'day')}`;
}

export function buildTemplateContext(
  classification: Classification,
  courses: Course[],
  metadata: ReportMetadata
): TemplateContext {
  const { overdue, dueToday, upcoming, recentlySubmitted } = classification;
  const hasAny = classification.totalInPeriod > 0;

  return {
    title: metadata.title,
    generation_date: dayjs(metadata.generatedAt).format('YYYY-MM-DD HH:mm:ss'),
    period: describeWindow(metadata.window),
    total_tasks: classification.totalInPeriod,
    courses_count_line: `**Courses found:** ${courses.length}`,
    courses_explored_section: buildCoursesExploredSection(courses),
    section_recently_submitted: buildRecentlySubmittedSection(recentlySubmitted),
    section_overdue: buildOverdueSection(overdue),
    section_due_today: buildDueTodaySection(dueToday),
    section_upcoming: buildUpcomingSection(upcoming),
    empty_message: hasAny ? '' : `${EMPTY_MESSAGE}\n\n`,
    footer: FOOTER,
  };
}

export function renderReport(
  classification: Classification,
  courses: Course[],
  metadata: ReportMetadata,
  template: string
): string {
  return renderTemplate(template, buildTemplateContext(classification, courses, metadata));
}
