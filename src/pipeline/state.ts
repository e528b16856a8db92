import {
  Assignment,
  Classification,
  Course,
  PortalProfile,
  SessionCookie,
} from '../types/index.js';

export interface RunOptions {
  profileName: string;
  profile: PortalProfile;
  baseUrl: string;
  username: string;
  password: string;
  daysAhead: number;
  daysBehind: number;
  /** 0 means every course found. */
  maxCourses: number;
  outputDir: string;
  reportTitle: string;
}

export interface PipelineState extends Readonly<RunOptions> {
  authenticated: boolean;
  sessionCookies: SessionCookie[];
  courses: Course[];
  assignments: Assignment[];
  classification: Classification | null;
  /** Append-only; every stage failure ends up here as a message. */
  errors: string[];
  reportPath: string;
}

type StageOutputs = Omit<PipelineState, keyof RunOptions | 'errors'>;

/** What a node hands back: the fields it produced plus errors to append. */
export type StageUpdate = Partial<StageOutputs> & { errors?: string[] };

export function createInitialState(options: RunOptions): PipelineState {
  return {
    ...options,
    authenticated: false,
    sessionCookies: [],
    courses: [],
    assignments: [],
    classification: null,
    errors: [],
    reportPath: '',
  };
}

export function applyUpdate(state: PipelineState, update: StageUpdate): PipelineState {
  const { errors = [], ...outputs } = update;
  return { ...state, ...outputs, errors: [...state.errors, ...errors] };
}
