// Jest setup file
import { reconfigureLogger } from './src/utils/logger';

// bcrypt at low cost is still the slowest thing in the suite
jest.setTimeout(10000);

process.env.NODE_ENV = 'test';

// Tests that assert on log output set their own level
reconfigureLogger('silent');
