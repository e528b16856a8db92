import { describe, it, expect } from 'vitest';
import { Assignment, Classification, ClassifiedAssignment } from '../../types/index.js';
import {
  EMPTY_MESSAGE,
  buildCoursesExploredSection,
  buildOverdueSection,
  describeWindow,
  renderReport,
} from '../render.js';

const template = [
  '# {title}',
  '',
  '**Generated:** {generation_date}',
  '**Period:** {period}',
  '**Total tasks:** {total_tasks}',
  '{courses_count_line}',
  '',
  '---',
  '',
  '{courses_explored_section}{section_recently_submitted}{section_overdue}{section_due_today}{section_upcoming}{empty_message}---',
  '',
  '{footer}',
  '',
].join('\n');

const metadata = {
  title: 'Assignment report - campus.example.edu',
  generatedAt: new Date(2026, 2, 1, 9, 30, 0),
  window: { daysAhead: 7, daysBehind: 7 },
};

const emptyClassification: Classification = {
  overdue: [],
  dueToday: [],
  upcoming: [],
  recentlySubmitted: [],
  totalInPeriod: 0,
};

function makeAssignment(title: string, overrides: Partial<Assignment> = {}): Assignment {
  return {
    title,
    rawDueDate: '',
    course: 'Algebra I',
    type: 'assignment',
    url: `https://campus.example.edu/mod/assign/view.php?id=${title.length}`,
    section: 'Main',
    submissionStatus: { submitted: false, statusText: 'Not submitted', daysAgo: null },
    ...overrides,
  };
}

type Classified = Omit<ClassifiedAssignment, keyof Assignment> & { normalizedDueDate: Date };

function classified(title: string, fields: Classified): ClassifiedAssignment {
  return { ...makeAssignment(title), ...fields };
}

describe('renderReport', () => {
  it('renders an empty period', () => {
    const report = renderReport(emptyClassification, [], metadata, template);

    expect(report).toBe(
      [
        '# Assignment report - campus.example.edu',
        '',
        '**Generated:** 2026-03-01 09:30:00',
        '**Period:** Last 7 days and next 7 days',
        '**Total tasks:** 0',
        '**Courses found:** 0',
        '',
        '---',
        '',
        '## Courses explored',
        '',
        'No courses were found.',
        '',
        '## No pending items in this period.',
        '',
        '---',
        '',
        '*Report generated by lms-report*',
        '',
      ].join('\n')
    );
  });

  it('orders the sections and omits the empty ones', () => {
    const classification: Classification = {
      overdue: [classified('Essay', { status: 'OVERDUE', daysOverdue: 1, normalizedDueDate: new Date(2026, 1, 28) })],
      dueToday: [],
      upcoming: [classified('Quiz 2', { status: 'UPCOMING', daysUntilDue: 3, normalizedDueDate: new Date(2026, 2, 4) })],
      recentlySubmitted: [
        makeAssignment('Lab', {
          submissionStatus: { submitted: true, statusText: 'Submitted 2 days ago', daysAgo: 2 },
        }),
      ],
      totalInPeriod: 3,
    };
    const courses = [{ url: 'https://campus.example.edu/course/view.php?id=3', name: 'Algebra I' }];

    const report = renderReport(classification, courses, metadata, template);

    expect(report).toContain('**Total tasks:** 3\n**Courses found:** 1\n');
    expect(report).toContain('## Courses explored\n\n- Algebra I\n\n');
    expect(report).toContain(
      '## Recently submitted (last 7 days)\n\n- **Lab** in **Algebra I**\n  - *Status:* Submitted 2 days ago\n'
    );
    expect(report).toContain('  - *Due:* 2026-02-28\n  - *Overdue by:* 1 day\n');
    expect(report).toContain('  - *Due:* 2026-03-04\n  - *Due in:* 3 days\n');
    expect(report).not.toContain('## Due today');
    expect(report).not.toContain(EMPTY_MESSAGE);

    const order = ['## Courses explored', '## Recently submitted', '## Overdue', '## Upcoming'].map((h) =>
      report.indexOf(h)
    );
    expect(order).toEqual([...order].sort((a, b) => a - b));
  });

  it('renders the same input to the same text', () => {
    const courses = [{ url: 'https://campus.example.edu/course/view.php?id=3', name: 'Algebra I' }];
    expect(renderReport(emptyClassification, courses, metadata, template)).toBe(
      renderReport(emptyClassification, courses, metadata, template)
    );
  });
});

describe('section builders', () => {
  it('lists explored courses', () => {
    expect(buildCoursesExploredSection([{ url: 'https://x.edu/c/1', name: 'Physics' }])).toBe(
      '## Courses explored\n\n- Physics\n\n'
    );
  });

  it('renders nothing for an empty section', () => {
    expect(buildOverdueSection([])).toBe('');
  });

  it('describes the window', () => {
    expect(describeWindow({ daysAhead: 1, daysBehind: 14 })).toBe('Last 14 days and next 1 day');
  });
});
