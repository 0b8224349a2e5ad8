/** Version reported by /health and the startup banner. */
export const VERSION = '0.1.0';
