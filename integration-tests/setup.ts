// Keep test output readable; the logger checks this on every call
process.env.LOG_LEVEL = 'silent';
