import dayjs from 'dayjs';
import {
  Assignment,
  Classification,
  ClassifiedAssignment,
  DateWindow,
} from '../types/index.js';
import { normalizeDate } from '../dates/normalizer.js';
import { RECENT_SUBMISSION_DAYS, daysBetween } from '../dates/submission.js';

// Unknown submission age sorts last and never counts as recent
const UNKNOWN_DAYS_AGO = 999;

export interface ClassifyOptions extends DateWindow {
  today?: Date;
}

function dueDateOf(assignment: Assignment, today: Date): Date | null {
  if (assignment.normalizedDueDate !== undefined) {
    return assignment.normalizedDueDate;
  }
  return normalizeDate(assignment.rawDueDate, today);
}

/** Attach `normalizedDueDate` to every assignment; input is left untouched. */
export function normalizeDueDates(assignments: Assignment[], now: Date = new Date()): Assignment[] {
  return assignments.map((assignment) => ({
    ...assignment,
    normalizedDueDate: normalizeDate(assignment.rawDueDate, now),
  }));
}

/**
 * Tag every assignment whose due date falls within
 * [today - daysBehind, today + daysAhead]. Assignments without a usable
 * date are dropped.
 */
export function classifyAssignments(
  assignments: Assignment[],
  options: ClassifyOptions
): ClassifiedAssignment[] {
  const today = dayjs(options.today ?? new Date()).startOf('day').toDate();
  const classified: ClassifiedAssignment[] = [];

  for (const assignment of assignments) {
    const due = dueDateOf(assignment, today);
    if (!due) continue;

    const offset = daysBetween(today, due);
    if (offset > options.daysAhead || -offset > options.daysBehind) continue;

    if (offset < 0) {
      classified.push({ ...assignment, normalizedDueDate: due, status: 'OVERDUE', daysOverdue: -offset });
    } else if (offset === 0) {
      classified.push({ ...assignment, normalizedDueDate: due, status: 'DUE_TODAY', daysUntilDue: 0 });
    } else {
      classified.push({ ...assignment, normalizedDueDate: due, status: 'UPCOMING', daysUntilDue: offset });
    }
  }

  return classified;
}

export function partitionByStatus(classified: ClassifiedAssignment[]) {
  return {
    overdue: classified.filter((a) => a.status === 'OVERDUE'),
    dueToday: classified.filter((a) => a.status === 'DUE_TODAY'),
    upcoming: classified.filter((a) => a.status === 'UPCOMING'),
  };
}

/** Submitted within the last `days` (a week by default), from the unfiltered list, most recent first. */
export function selectRecentlySubmitted(
  assignments: Assignment[],
  days: number = RECENT_SUBMISSION_DAYS
): Assignment[] {
  return assignments
    .filter((a) => {
      const { submitted, daysAgo } = a.submissionStatus;
      return submitted && daysAgo != null && daysAgo >= 0 && daysAgo <= days;
    })
    .sort(
      (a, b) =>
        (a.submissionStatus.daysAgo ?? UNKNOWN_DAYS_AGO) -
        (b.submissionStatus.daysAgo ?? UNKNOWN_DAYS_AGO)
    );
}

export function buildClassification(
  assignments: Assignment[],
  options: ClassifyOptions
): Classification {
  const { overdue, dueToday, upcoming } = partitionByStatus(classifyAssignments(assignments, options));
  const recentlySubmitted = selectRecentlySubmitted(assignments);

  return {
    overdue,
    dueToday,
    upcoming,
    recentlySubmitted,
    totalInPeriod: overdue.length + dueToday.length + upcoming.length + recentlySubmitted.length,
  };
}
