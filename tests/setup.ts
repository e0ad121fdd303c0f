import dotenv from 'dotenv';

// Load test environment variables
dotenv.config({ path: '.env.test' });

// Mock environment variables for testing
process.env.NODE_ENV = 'test';
process.env.NTFY_TOPIC = process.env.NTFY_TOPIC || 'test-topic';
process.env.NTFY_SERVER = process.env.NTFY_SERVER || 'https://ntfy.test';
process.env.REDIS_URL = process.env.REDIS_URL || 'redis://localhost:6379';
process.env.RESULTS_DIR = process.env.RESULTS_DIR || 'test-results';

// Global test timeout
jest.setTimeout(30000);
