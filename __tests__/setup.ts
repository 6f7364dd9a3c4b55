/**
 * Jest setup file
 * Runs before each test file, ahead of any import of src/config
 */

process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.MATCH_THRESHOLD = '0.8';
process.env.MIN_SUBSTRING_LENGTH = '5';
process.env.MAX_STORED_REPORTS = '5';
process.env.MAX_UPLOAD_BYTES = '65536';
