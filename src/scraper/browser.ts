import { AuthProfile, SessionCookie } from '../types/index.js';

export interface LoginRequest {
  loginUrl: string;
  username: string;
  password: string;
  auth: AuthProfile;
  timeoutMs: number;
}

export interface LoginResult {
  success: boolean;
  cookies: SessionCookie[];
  error: string | null;
}

export interface FetchPageRequest {
  url: string;
  cookies: SessionCookie[];
  timeoutMs: number;
}

/**
 * What the pipeline needs from browser automation. Every page fetch gets the
 * session cookies passed in; the driver never refreshes them.
 */
export interface BrowserDriver {
  login(request: LoginRequest): Promise<LoginResult>;
  /** Navigate, wait for the network to settle, return the rendered HTML. */
  fetchPage(request: FetchPageRequest): Promise<string>;
  close(): Promise<void>;
}
