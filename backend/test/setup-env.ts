// Loaded before every test file (vitest setupFiles). The logger reads these at import time.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
process.env.STORAGE_DRIVER = process.env.STORAGE_DRIVER ?? 'memory';
