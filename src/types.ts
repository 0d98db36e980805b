/**
 * Core type definitions for org-repo-exporter
 *
 * @module types
 */

/**
 * Anything that can render itself as a single menu line.
 *
 * Organizations and repositories implement this independently so the
 * selection menu stays generic over any listable resource.
 */
export interface Displayable {
  displayLabel(): string;
}

/**
 * Username and personal access token supplied as HTTP Basic auth.
 *
 * Lives for one run only and is never written to disk or logged.
 */
export interface Credential {
  readonly identity: string;
  readonly secret: string;
}

/**
 * GitHub organization the authenticated user belongs to
 */
export interface Organization extends Displayable {
  readonly login: string;
  /** REST endpoint listing the organization's repositories */
  readonly reposUrl: string;
  readonly description: string;
}

export type CloneProtocol = 'ssh' | 'https';

/**
 * Repository owned by an organization
 */
export interface Repository extends Displayable {
  readonly name: string;
  /** URL handed to `git clone`, chosen by the configured protocol */
  readonly cloneUrl: string;
  readonly sshUrl: string;
  readonly httpsUrl: string;
}

/**
 * One comma-separated entry of an RFC 5988 Link header
 */
export interface LinkItem {
  readonly targetUrl: string;
  readonly relation: string;
}

/**
 * Parsed Link header. Relations are not guaranteed unique.
 */
export interface LinkHeader {
  readonly items: readonly LinkItem[];
}

/**
 * Decodes one response body into typed items. Throws on invalid payloads.
 */
export type PageDecoder<T> = (body: string) => T[];
