import { setLogLevel } from './logger';

// keep test output readable; failures are asserted, not read from the log
setLogLevel('error');
