export const APP_NAME = 'aria2-postprocess';
export const APP_VERSION = '1.0.0';

export const API_GLOBAL_PREFIX = 'api';
export const API_PREFIX_PATH = `/${API_GLOBAL_PREFIX}`;
export const API_DOCS_PATH = `${API_GLOBAL_PREFIX}/docs`;

export const HTTP_SLOW_REQUEST_THRESHOLD_MS = 1_500;
