/** Library version reported in the User-Agent header. Keep in step with package.json. */
export const VERSION = '0.1.0';
