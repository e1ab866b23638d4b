export { createSweepers, type Sweepers } from './service';
