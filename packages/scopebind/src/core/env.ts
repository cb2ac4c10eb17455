export const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';
