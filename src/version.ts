// Версия для CLI и /health.
export const VERSION = '0.1.0';
