// Prompt shapes sent to the local model and guards for what comes back.

export interface CourseListItem {
  name: string;
  url: string;
}

export interface CoursePageVerdict {
  is_course: boolean;
  course_name: string;
}

export interface AssignmentItem {
  title: string;
  due_date: string;
  url: string;
  type: string;
}

export function buildCourseListPrompt(snippet: string, baseUrl: string, linkPattern: string): string {
  return `The following HTML is the "My courses" page of a learning-management portal at ${baseUrl}.
Extract EVERY course listed on it. For each course return:
1) "name": the full course name exactly as displayed.
2) "url": the course link. It should contain "${linkPattern}". Relative links are relative to ${baseUrl}.

Respond ONLY with a valid JSON array of objects with exactly two keys, "name" and "url".
Example: [{"name": "Linear Algebra - Group 01", "url": "${baseUrl}/${linkPattern}?id=42"}]
No explanations, no markdown.

HTML:
${snippet}
`;
}

export function buildCoursePagePrompt(snippet: string, url: string): string {
  return `You are looking at a page of a learning-management portal (${url}).
Decide whether this page is the main page of a single course (a class the student is enrolled in),
as opposed to a dashboard, a profile, a calendar, a help page or a list of many courses.

Respond ONLY with a JSON object: {"is_course": true or false, "course_name": "name shown on the page or empty"}
No explanations, no markdown.

HTML:
${snippet}
`;
}

export function buildAssignmentPrompt(snippet: string, courseName: string): string {
  return `The following HTML is the page of the course "${courseName}" in a learning-management portal.
List every gradable activity on it (assignments, quizzes, forums, workshops) that has a link.
For each one return:
- "title": the activity name as displayed
- "due_date": the due date text as displayed, or "" if none is shown
- "url": the activity link
- "type": one of "assignment", "quiz", "forum", "workshop", "activity"

Respond ONLY with a valid JSON array of objects with exactly those four keys.
No explanations, no markdown.

HTML:
${snippet}
`;
}

/** Parse a model completion as JSON, tolerating a Markdown code fence. */
export function parseJsonResponse(output: string): unknown {
  const stripped = output
    .trim()
    .replace(/^```\w*\s*/, '')
    .replace(/\s*```$/, '')
    .trim();
  if (!stripped) return null;

  try {
    return JSON.parse(stripped);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value.trim() : '';
}

export function toCourseListItems(value: unknown): CourseListItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((item) => ({
    name: stringField(item, 'name'),
    url: stringField(item, 'url'),
  }));
}

export function toCoursePageVerdict(value: unknown): CoursePageVerdict | null {
  if (!isRecord(value) || typeof value.is_course !== 'boolean') return null;
  return { is_course: value.is_course, course_name: stringField(value, 'course_name') };
}

export function toAssignmentItems(value: unknown): AssignmentItem[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).map((item) => ({
    title: stringField(item, 'title'),
    due_date: stringField(item, 'due_date'),
    url: stringField(item, 'url'),
    type: stringField(item, 'type'),
  }));
}
