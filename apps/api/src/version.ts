/**
 * Version reported by the health endpoints. Kept in step with package.json.
 */
export const API_VERSION = '0.1.0';
