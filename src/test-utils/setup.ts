import { setLogLevel } from '../main/utils/logger';

// Provider warnings would otherwise clutter the test report
setLogLevel('silent');
