import { setQuiet } from '../src/utils/logger.js';

// Keep the live log out of test output.
setQuiet(true);
