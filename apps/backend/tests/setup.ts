if (!process.env.LOG_LEVEL) {
  process.env.LOG_LEVEL = 'error';
}
if (!process.env.NODE_ENV) {
  process.env.NODE_ENV = 'test';
}
