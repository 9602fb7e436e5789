import { jest } from '@jest/globals';

// Mock electron-log
jest.mock('electron-log/node', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    transports: {
      console: { level: 'info' },
      file: { level: 'info' },
    },
  },
}));
