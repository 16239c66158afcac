import { LogLevel, SetLogLevel } from '../../src/Common/Log.js';

// keep test output readable; only critical messages reach the console
SetLogLevel(LogLevel.Critical);
