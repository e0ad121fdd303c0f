import { loadSettings } from '../src/config/settings';
import { ConfigurationError } from '../src/errors';
import { startApp } from '../src/index';

const mockRedis = {
  ping: jest.fn(),
  disconnect: jest.fn(),
};

jest.mock('bullmq', () => ({
  Queue: jest.fn(() => ({ add: jest.fn(), close: jest.fn() })),
  Worker: jest.fn(() => ({ on: jest.fn(), close: jest.fn() })),
}));
jest.mock('ioredis', () => jest.fn(() => mockRedis));

describe('startApp', () => {
  it('should reject with a configuration error when the ntfy topic is missing', async () => {
    const sigtermListeners = process.listenerCount('SIGTERM');

    await expect(startApp(() => loadSettings({}))).rejects.toThrow(ConfigurationError);

    expect(process.listenerCount('SIGTERM')).toBe(sigtermListeners);
    expect(mockRedis.ping).not.toHaveBeenCalled();
  });
});
