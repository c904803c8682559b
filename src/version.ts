export const APP_NAME = 'context-filter-proxy';
export const APP_VERSION = '0.1.0';
