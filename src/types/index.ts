// Core data types used throughout the application

export type AssignmentType = 'assignment' | 'quiz' | 'forum' | 'workshop' | 'activity';

export type AssignmentStatus = 'OVERDUE' | 'DUE_TODAY' | 'UPCOMING';

export interface Course {
  url: string;
  name: string;
}

export interface SubmissionStatus {
  submitted: boolean;
  statusText: string;
  daysAgo?: number | null;
}

export interface Assignment {
  title: string;
  rawDueDate: string;
  /** Set by the classify stage, never by extraction. */
  normalizedDueDate?: Date | null;
  course: string;
  type: AssignmentType;
  url: string;
  section: string;
  submissionStatus: SubmissionStatus;
}

export interface ClassifiedAssignment extends Assignment {
  normalizedDueDate: Date;
  status: AssignmentStatus;
  daysOverdue?: number;
  daysUntilDue?: number;
}

export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path?: string;
}

export interface DateWindow {
  daysAhead: number;
  daysBehind: number;
}

export interface Classification {
  overdue: ClassifiedAssignment[];
  dueToday: ClassifiedAssignment[];
  upcoming: ClassifiedAssignment[];
  recentlySubmitted: Assignment[];
  totalInPeriod: number;
}

export interface SuccessIndicator {
  urlContains?: string;
  elementPresent?: string;
}

export interface ErrorIndicator {
  textContains?: string;
  elementPresent?: string;
}

export interface AuthProfile {
  loginPath: string;
  formSelectors: {
    username: string;
    password: string;
    submit: string;
  };
  successIndicators: SuccessIndicator[];
  errorIndicators: ErrorIndicator[];
}

export interface AssignmentTypeProfile {
  name: AssignmentType;
  selectors: string[];
}

export type CourseStrategyName = 'link-segment' | 'structural' | 'classifier' | 'exploratory';

export interface PortalProfile {
  metadata: {
    name: string;
    platform: string;
    description?: string;
  };
  auth: AuthProfile;
  navigation: {
    coursesPage: string;
  };
  courses: {
    cardSelectors: string[];
    nameSelectors: string[];
    containerSelectors: string[];
    linkPattern: string;
  };
  courseDiscovery: {
    order: CourseStrategyName[];
    pathKeywords: string[];
    candidatePatterns: string[];
    maxCandidates: number;
  };
  assignments: {
    types: AssignmentTypeProfile[];
    useClassifier: boolean;
  };
  dates: {
    selectors: string[];
    patterns: string[];
  };
  submission: {
    submittedKeywords: string[];
  };
  sections: {
    selector: string;
    nameSelector: string;
  };
  reports: {
    titleTemplate: string;
  };
}

export interface Config {
  portal: {
    profile: string;
    baseUrl: string;
    username: string;
    password: string;
  };
  scraper: {
    daysAhead: number;
    daysBehind: number;
    maxCourses: number;
    debug: boolean;
    requestDelayMs: number;
    timeoutMs: number;
    headless: boolean;
    browserChannel?: string;
  };
  ollama: {
    enabled: boolean;
    baseUrl: string;
    model: string;
    timeoutMs: number;
    maxCourseChars: number;
    maxPageChars: number;
  };
  logging: {
    level: string;
    silent: boolean;
  };
  paths: {
    projectRoot: string;
    dataDir: string;
    logFile: string;
    outputDir: string;
    profilesDir: string;
    templatesDir: string;
  };
}
