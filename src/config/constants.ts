export const APP_NAME = 'org-repo-exporter';

// HTTP
export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const USER_AGENT = 'org-repo-exporter';
export const GITHUB_ACCEPT_HEADER = 'application/vnd.github+json';
export const TOKEN_SETTINGS_URL = 'https://github.com/settings/tokens';

// Pagination
export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 100;

// Cloning
export const DEFAULT_GIT_BINARY = 'git';
export const CLONE_STDERR_TAIL_CHARS = 4 * 1024;

// Logging
export const LOG_FILE_NAME = 'exporter.log';
export const MAX_LOG_FILE_SIZE = 5 * 1024 * 1024; // 5MB
export const MAX_LOG_FILES = 5;

// UI
export const MAX_LABEL_WIDTH = 72;
