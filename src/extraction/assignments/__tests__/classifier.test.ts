import { describe, it, expect } from 'vitest';
import { ClassifierAssignmentStrategy } from '../classifier.js';
import { buildAssignmentStrategies, extractAssignments } from '../index.js';
import { FakeLanguageModel } from '../../../testing/fakes.js';
import { parseProfile } from '../../../profiles/loader.js';

const course = { url: 'https://campus.example.edu/course/view.php?id=3', name: 'Algebra I' };
const html = '<html><body><p>Lab report due 20 March</p></body></html>';

const answer = `\`\`\`json
[
  {"title": "Lab report", "due_date": "2026-03-20", "url": "/mod/assign/view.php?id=21", "type": "quiz"},
  {"title": "", "due_date": "2026-03-21", "url": "/mod/quiz/view.php?id=22", "type": "quiz"},
  {"title": "Reading", "due_date": "", "url": "/mod/page/view.php?id=23", "type": "activity"},
  {"title": "Lab report", "due_date": "", "url": "/mod/assign/view.php?id=21", "type": "assignment"}
]
\`\`\``;

describe('ClassifierAssignmentStrategy', () => {
  it('turns the model answer into assignments', async () => {
    const model = new FakeLanguageModel([answer]);
    const assignments = await new ClassifierAssignmentStrategy(model, 8000).extract({ html, course });

    expect(assignments).toEqual([
      {
        title: 'Lab report',
        rawDueDate: '2026-03-20',
        course: 'Algebra I',
        type: 'assignment',
        url: 'https://campus.example.edu/mod/assign/view.php?id=21',
        section: 'Main',
        submissionStatus: { submitted: false, statusText: 'Not submitted', daysAgo: null },
      },
      {
        title: 'Reading',
        rawDueDate: '',
        course: 'Algebra I',
        type: 'assignment',
        url: 'https://campus.example.edu/mod/page/view.php?id=23',
        section: 'Main',
        submissionStatus: { submitted: false, statusText: 'Not submitted', daysAgo: null },
      },
    ]);
    expect(model.prompts[0]).toContain('"Algebra I"');
  });

  it('returns nothing for an unparseable answer', async () => {
    const model = new FakeLanguageModel(['Sorry, no activities.']);
    expect(await new ClassifierAssignmentStrategy(model, 8000).extract({ html, course })).toEqual([]);
  });
});

describe('assignment cascade', () => {
  const profile = parseProfile(
    {
      metadata: { name: 'test' },
      auth: { formSelectors: { username: '#u', password: '#p', submit: '#s' } },
      navigation: { coursesPage: '/my/' },
      courses: { linkPattern: 'course/view.php' },
      assignments: { types: [{ name: 'assignment', selectors: ["a[href*='mod/assign']"] }] },
      dates: { patterns: [] },
    },
    'test'
  );

  it('consults the model only when selectors find nothing', async () => {
    const model = new FakeLanguageModel([answer]);
    const context = { profile, model, maxPageChars: 8000, timeoutMs: 0, now: () => new Date(2026, 2, 1) };

    const fromSelectors = await extractAssignments(
      { html: '<a href="/mod/assign/view.php?id=5">Problem set 1</a>', course },
      context
    );
    expect(fromSelectors.strategy).toBe('selector');
    expect(model.prompts).toHaveLength(0);

    const fromModel = await extractAssignments({ html, course }, context);
    expect(fromModel.strategy).toBe('classifier');
    expect(fromModel.items.map((a) => a.title)).toEqual(['Lab report', 'Reading']);
  });

  it('leaves the classifier out when the profile disables it', () => {
    const strategies = buildAssignmentStrategies({
      profile: { ...profile, assignments: { ...profile.assignments, useClassifier: false } },
      model: new FakeLanguageModel(),
      maxPageChars: 8000,
      timeoutMs: 0,
      now: () => new Date(),
    });
    expect(strategies.map((s) => s.name)).toEqual(['selector']);
  });
});
