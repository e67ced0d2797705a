// Runs before each test file's modules load, so config picks these up.
process.env.NODE_ENV = 'test';
process.env.STORAGE_DRIVER = 'memory';
process.env.JWT_SECRET = 'test-jwt-secret-key';
process.env.ROUTER_API_KEY = 'test-router-key';
process.env.LOOKUP_TIMEOUT_MS = '200';
process.env.ATTACHMENT_MAX_AGE_SECONDS = '300';
