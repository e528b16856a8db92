import { Assignment, DateWindow } from '../types/index.js';
import { PipelineState } from '../pipeline/state.js';
import { buildClassification, selectRecentlySubmitted } from '../report/classify.js';
import { formatIsoDate } from '../dates/normalizer.js';
import { logger } from '../utils/logger.js';

export const NOT_CONFIGURED_MESSAGE =
  'Set PORTAL_BASE_URL, PORTAL_USERNAME and PORTAL_PASSWORD to reach the portal.';

export interface McpToolDeps {
  /** False when the portal URL or credentials are missing; no tool touches the portal then. */
  isConfigured: boolean;
  /** One full pipeline run over the given window. */
  runReport(window: DateWindow): Promise<PipelineState>;
  listProfiles(): string[];
  clock(): Date;
}

export interface McpTools {
  getPendingAssignments(window: DateWindow): Promise<string>;
  getSubmittedAssignments(days: number): Promise<string>;
  getCourses(): Promise<string>;
  generateReport(window: DateWindow): Promise<string>;
  checkDeadlines(days: number): Promise<string>;
  listProfiles(): Promise<string>;
}

function dueLabel(assignment: Assignment): string {
  return assignment.normalizedDueDate ? formatIsoDate(assignment.normalizedDueDate) : assignment.rawDueDate;
}

export function formatAssignmentLines(assignments: Assignment[]): string {
  if (assignments.length === 0) {
    return 'No assignments match.';
  }
  return assignments
    .map((a) => `- ${a.title} | ${a.course} | ${dueLabel(a)} | ${a.url}`)
    .join('\n');
}

/**
 * The tools the MCP server exposes, as plain functions returning text.
 * Every portal tool runs the whole pipeline; nothing is cached between calls.
 */
export function createMcpTools(deps: McpToolDeps): McpTools {
  async function withRun(window: DateWindow, render: (state: PipelineState) => string): Promise<string> {
    if (!deps.isConfigured) {
      return NOT_CONFIGURED_MESSAGE;
    }
    const state = await deps.runReport(window);
    logger.info(`MCP run finished: ${state.courses.length} courses, ${state.assignments.length} assignments`);
    return render(state);
  }

  return {
    getPendingAssignments: (window) =>
      withRun(window, (state) => {
        const { overdue, dueToday, upcoming } = buildClassification(state.assignments, {
          ...window,
          today: deps.clock(),
        });
        return formatAssignmentLines([...overdue, ...dueToday, ...upcoming]);
      }),

    getSubmittedAssignments: (days) =>
      withRun({ daysAhead: 0, daysBehind: days }, (state) =>
        formatAssignmentLines(selectRecentlySubmitted(state.assignments, days))
      ),

    getCourses: () =>
      withRun({ daysAhead: 0, daysBehind: 0 }, (state) => {
        if (state.courses.length === 0) {
          return 'No courses were found, or the login failed.';
        }
        return state.courses.map((c) => `- ${c.name}: ${c.url}`).join('\n');
      }),

    generateReport: (window) =>
      withRun(window, (state) =>
        state.reportPath ? `Report saved to: ${state.reportPath}` : 'No report was written.'
      ),

    checkDeadlines: (days) =>
      withRun({ daysAhead: days, daysBehind: 0 }, (state) => {
        const { overdue, dueToday, upcoming } = buildClassification(state.assignments, {
          daysAhead: days,
          daysBehind: 0,
          today: deps.clock(),
        });
        return `Overdue: ${overdue.length} | Due today: ${dueToday.length} | Upcoming (next ${days} days): ${upcoming.length}`;
      }),

    listProfiles: async () => {
      const names = deps.listProfiles();
      return names.length > 0 ? names.join('\n') : 'No profiles found.';
    },
  };
}
