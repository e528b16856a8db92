import fs from 'fs';
import path from 'path';
import {
  AssignmentType,
  AssignmentTypeProfile,
  CourseStrategyName,
  ErrorIndicator,
  PortalProfile,
  SuccessIndicator,
} from '../types/index.js';
import { config } from '../utils/config.js';
import { hostOf } from '../utils/urls.js';

export class ProfileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProfileError';
  }
}

const ASSIGNMENT_TYPES: AssignmentType[] = ['assignment', 'quiz', 'forum', 'workshop', 'activity'];
const STRATEGY_NAMES: CourseStrategyName[] = ['link-segment', 'structural', 'classifier', 'exploratory'];

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collects every problem in a profile document instead of stopping at the
 * first, so `profiles validate` can report them all.
 */
class ProfileReader {
  readonly problems: string[] = [];

  section(root: Json, key: string, required = true): Json {
    const value = root[key];
    if (isObject(value)) return value;
    if (required || value !== undefined) this.problems.push(`"${key}" must be an object`);
    return {};
  }

  string(obj: Json, key: string, where: string, fallback?: string): string {
    const value = obj[key];
    if (typeof value === 'string' && value.trim()) return value;
    if (value === undefined && fallback !== undefined) return fallback;
    this.problems.push(`${where}.${key} must be a non-empty string`);
    return fallback ?? '';
  }

  strings(obj: Json, key: string, where: string, fallback?: string[]): string[] {
    const value = obj[key];
    if (Array.isArray(value) && value.every((v): v is string => typeof v === 'string')) return value;
    if (value === undefined && fallback !== undefined) return fallback;
    this.problems.push(`${where}.${key} must be an array of strings`);
    return fallback ?? [];
  }

  number(obj: Json, key: string, where: string, fallback: number): number {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0) return value;
    this.problems.push(`${where}.${key} must be a non-negative integer`);
    return fallback;
  }

  boolean(obj: Json, key: string, where: string, fallback: boolean): boolean {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value === 'boolean') return value;
    this.problems.push(`${where}.${key} must be a boolean`);
    return fallback;
  }

  indicators(obj: Json, key: string, keys: string[]): Json[] {
    const value = obj[key];
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every(isObject)) {
      this.problems.push(`auth.${key} must be an array of objects`);
      return [];
    }
    return value.filter((item) => keys.some((k) => typeof item[k] === 'string'));
  }
}

function optionalString(obj: Json, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' ? value : undefined;
}

export function parseProfile(data: unknown, name: string): PortalProfile {
  if (!isObject(data)) {
    throw new ProfileError(`Profile "${name}" is empty or not a JSON object`);
  }

  const r = new ProfileReader();
  const metadata = r.section(data, 'metadata');
  const auth = r.section(data, 'auth');
  const form = isObject(auth.formSelectors) ? auth.formSelectors : {};
  const navigation = r.section(data, 'navigation');
  const courses = r.section(data, 'courses');
  const discovery = r.section(data, 'courseDiscovery', false);
  const assignments = r.section(data, 'assignments');
  const dates = r.section(data, 'dates');
  const submission = r.section(data, 'submission', false);
  const sections = r.section(data, 'sections', false);
  const reports = r.section(data, 'reports', false);

  const types: AssignmentTypeProfile[] = [];
  if (!Array.isArray(assignments.types) || assignments.types.length === 0) {
    r.problems.push('assignments.types must be a non-empty array');
  } else {
    assignments.types.forEach((entry: unknown, i: number) => {
      if (!isObject(entry)) {
        r.problems.push(`assignments.types[${i}] must be an object`);
        return;
      }
      const typeName = ASSIGNMENT_TYPES.find((t) => t === entry.name);
      if (!typeName) {
        r.problems.push(`assignments.types[${i}].name must be one of ${ASSIGNMENT_TYPES.join(', ')}`);
        return;
      }
      types.push({ name: typeName, selectors: r.strings(entry, 'selectors', `assignments.types[${i}]`) });
    });
  }

  const order: CourseStrategyName[] = [];
  for (const entry of r.strings(discovery, 'order', 'courseDiscovery', STRATEGY_NAMES)) {
    const strategy = STRATEGY_NAMES.find((s) => s === entry);
    if (strategy) {
      order.push(strategy);
    } else {
      r.problems.push(`courseDiscovery.order has unknown strategy "${entry}"`);
    }
  }

  const profile: PortalProfile = {
    metadata: {
      name: r.string(metadata, 'name', 'metadata', name),
      platform: r.string(metadata, 'platform', 'metadata', 'unknown'),
      description: optionalString(metadata, 'description'),
    },
    auth: {
      loginPath: r.string(auth, 'loginPath', 'auth', '/login/'),
      formSelectors: {
        username: r.string(form, 'username', 'auth.formSelectors'),
        password: r.string(form, 'password', 'auth.formSelectors'),
        submit: r.string(form, 'submit', 'auth.formSelectors'),
      },
      successIndicators: r
        .indicators(auth, 'successIndicators', ['urlContains', 'elementPresent'])
        .map((i): SuccessIndicator => ({
          urlContains: optionalString(i, 'urlContains'),
          elementPresent: optionalString(i, 'elementPresent'),
        })),
      errorIndicators: r
        .indicators(auth, 'errorIndicators', ['textContains', 'elementPresent'])
        .map((i): ErrorIndicator => ({
          textContains: optionalString(i, 'textContains'),
          elementPresent: optionalString(i, 'elementPresent'),
        })),
    },
    navigation: {
      coursesPage: r.string(navigation, 'coursesPage', 'navigation'),
    },
    courses: {
      cardSelectors: r.strings(courses, 'cardSelectors', 'courses', []),
      nameSelectors: r.strings(courses, 'nameSelectors', 'courses', []),
      containerSelectors: r.strings(courses, 'containerSelectors', 'courses', []),
      linkPattern: r.string(courses, 'linkPattern', 'courses'),
    },
    courseDiscovery: {
      order,
      pathKeywords: r.strings(discovery, 'pathKeywords', 'courseDiscovery', ['course', 'courses', 'cursos']),
      candidatePatterns: r.strings(discovery, 'candidatePatterns', 'courseDiscovery', []),
      maxCandidates: r.number(discovery, 'maxCandidates', 'courseDiscovery', 25),
    },
    assignments: {
      types,
      useClassifier: r.boolean(assignments, 'useClassifier', 'assignments', true),
    },
    dates: {
      selectors: r.strings(dates, 'selectors', 'dates', []),
      patterns: r.strings(dates, 'patterns', 'dates', []),
    },
    submission: {
      submittedKeywords: r.strings(submission, 'submittedKeywords', 'submission', ['submitted']),
    },
    sections: {
      selector: r.string(sections, 'selector', 'sections', 'li.section'),
      nameSelector: r.string(sections, 'nameSelector', 'sections', '.sectionname'),
    },
    reports: {
      titleTemplate: r.string(reports, 'titleTemplate', 'reports', 'Assignment report - {portal_name}'),
    },
  };

  for (const pattern of profile.dates.patterns) {
    try {
      new RegExp(pattern);
    } catch {
      r.problems.push(`dates.patterns has an invalid regular expression: ${pattern}`);
    }
  }

  if (r.problems.length > 0) {
    throw new ProfileError(`Profile "${name}" is invalid:\n  - ${r.problems.join('\n  - ')}`);
  }
  return profile;
}

export class ProfileLoader {
  private cache = new Map<string, PortalProfile>();

  constructor(private readonly profilesDir: string = config.paths.profilesDir) {}

  load(name: string): PortalProfile {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const profilePath = path.join(this.profilesDir, `${name}.json`);
    if (!fs.existsSync(profilePath)) {
      throw new ProfileError(`Profile not found: ${profilePath}`);
    }

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(profilePath, 'utf-8'));
    } catch (error) {
      throw new ProfileError(`Profile "${name}" is not valid JSON: ${error}`);
    }

    const profile = parseProfile(data, name);
    this.cache.set(name, profile);
    return profile;
  }

  list(): string[] {
    if (!fs.existsSync(this.profilesDir)) return [];
    return fs
      .readdirSync(this.profilesDir)
      .filter((file) => file.endsWith('.json'))
      .map((file) => path.basename(file, '.json'))
      .sort();
  }
}

export function portalTitle(profile: PortalProfile, baseUrl: string): string {
  return profile.reports.titleTemplate.replace('{portal_name}', hostOf(baseUrl) || 'LMS');
}
