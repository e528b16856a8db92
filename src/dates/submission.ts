import dayjs from 'dayjs';
import { SubmissionStatus } from '../types/index.js';
import { normalizeDate } from './normalizer.js';

export const RECENT_SUBMISSION_DAYS = 7;

export const NOT_SUBMITTED: SubmissionStatus = {
  submitted: false,
  statusText: 'Not submitted',
  daysAgo: null,
};

const NEGATION = /\b(not|no|sin|sin ser)\s+$/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function findKeyword(text: string, keywords: string[]): number {
  for (const keyword of keywords) {
    const regex = new RegExp(escapeRegExp(keyword), 'gi');
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      if (!NEGATION.test(text.slice(0, match.index))) {
        return match.index;
      }
    }
  }
  return -1;
}

export function daysBetween(earlier: Date, later: Date): number {
  return dayjs(later).startOf('day').diff(dayjs(earlier).startOf('day'), 'day');
}

/**
 * Read a submission marker ("Submitted 12/03/2026", "Entregado: ...") out of
 * the text around an activity link. Only the text after the marker is
 * searched for the submission date.
 */
export function detectSubmissionStatus(
  text: string,
  keywords: string[],
  now: Date = new Date()
): SubmissionStatus {
  const cleaned = text.replace(/\s+/g, ' ').trim();
  const index = findKeyword(cleaned, keywords);
  if (index < 0) {
    return { ...NOT_SUBMITTED };
  }

  const submittedOn = normalizeDate(cleaned.slice(index, index + 80), now);
  const daysAgo = submittedOn ? daysBetween(submittedOn, now) : -1;
  // A date after today is a deadline, not the submission
  if (daysAgo < 0) {
    return { submitted: true, statusText: 'Submitted (date not specified)', daysAgo: null };
  }

  return {
    submitted: true,
    statusText: daysAgo === 0 ? 'Submitted today' : `Submitted ${daysAgo} day${daysAgo === 1 ? '' : 's'} ago`,
    daysAgo,
  };
}
