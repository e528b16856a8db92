import { describe, it, expect, vi } from 'vitest';
import { ProfileLoader } from '../../profiles/loader.js';
import { loadReportTemplate } from '../../report/template.js';
import { FakeBrowser, FakeLanguageModel, MemoryReportSink } from '../../testing/fakes.js';
import { PipelineState, RunOptions, createInitialState } from '../../pipeline/state.js';
import { runPipeline } from '../../pipeline/workflow.js';
import { Assignment, DateWindow } from '../../types/index.js';
import { McpToolDeps, NOT_CONFIGURED_MESSAGE, createMcpTools } from '../tools.js';

const today = new Date(2026, 2, 1, 10, 0, 0);

const options: RunOptions = {
  profileName: 'moodle_default',
  profile: new ProfileLoader().load('moodle_default'),
  baseUrl: 'https://campus.example.edu',
  username: 'student',
  password: 'test-password',
  daysAhead: 7,
  daysBehind: 7,
  maxCourses: 0,
  outputDir: '/reports',
  reportTitle: 'Assignment report - campus.example.edu',
};

function makeAssignment(title: string, rawDueDate: string, overrides: Partial<Assignment> = {}): Assignment {
  return {
    title,
    rawDueDate,
    course: 'Algebra I',
    type: 'assignment',
    url: `https://campus.example.edu/mod/assign/view.php?id=${title.length}`,
    section: 'Main',
    submissionStatus: { submitted: false, statusText: 'Not submitted', daysAgo: null },
    ...overrides,
  };
}

function stateWith(fields: Partial<PipelineState>): PipelineState {
  return { ...createInitialState(options), authenticated: true, ...fields };
}

function depsFor(state: PipelineState, overrides: Partial<McpToolDeps> = {}) {
  const runReport = vi.fn(async (_window: DateWindow) => state);
  const deps: McpToolDeps = {
    isConfigured: true,
    runReport,
    listProfiles: () => ['moodle_default'],
    clock: () => today,
    ...overrides,
  };
  return { deps, runReport };
}

describe('createMcpTools', () => {
  it('does not touch the portal when it is not configured', async () => {
    const { deps, runReport } = depsFor(stateWith({}), { isConfigured: false });

    expect(await createMcpTools(deps).getCourses()).toBe(NOT_CONFIGURED_MESSAGE);
    expect(runReport).not.toHaveBeenCalled();
  });

  it('lists pending assignments from a full pipeline run', async () => {
    const browser = new FakeBrowser({
      'https://campus.example.edu/my/courses.php':
        '<div data-region="course-content"><a href="/course/view.php?id=3"><span class="multiline">Algebra I</span></a></div>',
      'https://campus.example.edu/course/view.php?id=3': `
        <ul class="topics"><li class="section"><h3 class="sectionname">Week 1</h3>
          <div class="activity">
            <a href="/mod/assign/view.php?id=11">Essay draft</a>
            <div data-region="activity-dates">Due: 15/03/2026</div>
          </div>
        </li></ul>`,
    });
    const tools = createMcpTools({
      isConfigured: true,
      runReport: (window) =>
        runPipeline(
          { ...options, ...window },
          {
            browser,
            model: new FakeLanguageModel([], false),
            openSink: () => new MemoryReportSink(),
            loadTemplate: () => loadReportTemplate(),
            clock: () => today,
            settings: { timeoutMs: 1000, requestDelayMs: 0, maxCourseChars: 18000, maxPageChars: 8000 },
          }
        ),
      listProfiles: () => [],
      clock: () => today,
    });

    expect(await tools.getPendingAssignments({ daysAhead: 30, daysBehind: 0 })).toBe(
      '- Essay draft | Algebra I | 2026-03-15 | https://campus.example.edu/mod/assign/view.php?id=11'
    );
    expect(await tools.getPendingAssignments({ daysAhead: 7, daysBehind: 0 })).toBe('No assignments match.');
  });

  it('lists submissions from the last N days only', async () => {
    const submitted = (title: string, daysAgo: number) =>
      makeAssignment(title, '2026-03-10', {
        submissionStatus: { submitted: true, statusText: 'Submitted', daysAgo },
      });
    const { deps, runReport } = depsFor(
      stateWith({ assignments: [submitted('Lab', 2), submitted('Old quiz', 10), submitted('Ahead', -3)] })
    );

    expect(await createMcpTools(deps).getSubmittedAssignments(5)).toBe(
      '- Lab | Algebra I | 2026-03-10 | https://campus.example.edu/mod/assign/view.php?id=3'
    );
    expect(runReport).toHaveBeenCalledWith({ daysAhead: 0, daysBehind: 5 });
  });

  it('lists courses', async () => {
    const { deps } = depsFor(
      stateWith({ courses: [{ url: 'https://campus.example.edu/course/view.php?id=3', name: 'Algebra I' }] })
    );
    expect(await createMcpTools(deps).getCourses()).toBe(
      '- Algebra I: https://campus.example.edu/course/view.php?id=3'
    );
  });

  it('says when no courses were found', async () => {
    const { deps } = depsFor(stateWith({ authenticated: false }));
    expect(await createMcpTools(deps).getCourses()).toBe('No courses were found, or the login failed.');
  });

  it('returns the report path', async () => {
    const { deps, runReport } = depsFor(stateWith({ reportPath: '/reports/assignments_report_20260301_100000.md' }));

    expect(await createMcpTools(deps).generateReport({ daysAhead: 14, daysBehind: 7 })).toBe(
      'Report saved to: /reports/assignments_report_20260301_100000.md'
    );
    expect(runReport).toHaveBeenCalledWith({ daysAhead: 14, daysBehind: 7 });
  });

  it('says when no report was written', async () => {
    const { deps } = depsFor(stateWith({ reportPath: '' }));
    expect(await createMcpTools(deps).generateReport({ daysAhead: 7, daysBehind: 7 })).toBe('No report was written.');
  });

  it('counts the deadlines from today onward', async () => {
    const { deps } = depsFor(
      stateWith({
        assignments: [
          makeAssignment('Late', '2026-02-27'),
          makeAssignment('Today', '2026-03-01'),
          makeAssignment('Soon', '2026-03-05'),
          makeAssignment('Later', '2026-03-20'),
        ],
      })
    );

    expect(await createMcpTools(deps).checkDeadlines(7)).toBe(
      'Overdue: 0 | Due today: 1 | Upcoming (next 7 days): 1'
    );
  });

  it('lists profiles without running the pipeline', async () => {
    const { deps, runReport } = depsFor(stateWith({}), { isConfigured: false });

    expect(await createMcpTools(deps).listProfiles()).toBe('moodle_default');
    expect(await createMcpTools({ ...deps, listProfiles: () => [] }).listProfiles()).toBe('No profiles found.');
    expect(runReport).not.toHaveBeenCalled();
  });
});
