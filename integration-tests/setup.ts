/**
 * Root hooks for the integration test run
 */

import { removeTempDirs } from "./helpers/jobContextHelper";

after(async () => {
  await removeTempDirs();
});
