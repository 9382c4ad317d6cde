import { SetLogLevel } from '../../src/Common/Log.js';

// Keep test output readable; individual tests raise the level when they assert on logging.
SetLogLevel('error');
