import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { McpToolDeps, createMcpTools } from './tools.js';

const INSTRUCTIONS =
  'Read-only access to the assignments, courses and deadlines of the configured learning portal. ' +
  'Each portal tool logs in and scrapes the portal again, so calls take a while.';

const days = (fallback: number) => z.number().int().min(0).default(fallback);

function text(value: string) {
  return { content: [{ type: 'text' as const, text: value }] };
}

export function createMcpServer(deps: McpToolDeps): McpServer {
  const tools = createMcpTools(deps);
  const server = new McpServer({ name: 'lms-report', version: '1.0.0' }, { instructions: INSTRUCTIONS });

  server.tool(
    'get_pending_assignments',
    'Overdue, due-today and upcoming assignments within the window',
    { days_ahead: days(7), days_behind: days(0) },
    async ({ days_ahead, days_behind }) =>
      text(await tools.getPendingAssignments({ daysAhead: days_ahead, daysBehind: days_behind }))
  );

  server.tool(
    'get_submitted_assignments',
    'Assignments submitted in the last N days',
    { days: days(7) },
    async (args) => text(await tools.getSubmittedAssignments(args.days))
  );

  server.tool('get_courses', 'Courses found on the portal', async () => text(await tools.getCourses()));

  server.tool(
    'generate_report',
    'Write the Markdown report and return its path',
    { days_ahead: days(7), days_behind: days(7) },
    async ({ days_ahead, days_behind }) =>
      text(await tools.generateReport({ daysAhead: days_ahead, daysBehind: days_behind }))
  );

  server.tool(
    'check_deadlines',
    'Count the deadlines in the next N days',
    { days: days(7) },
    async (args) => text(await tools.checkDeadlines(args.days))
  );

  server.tool('list_profiles', 'Portal profiles available to the server', async () =>
    text(await tools.listProfiles())
  );

  return server;
}
