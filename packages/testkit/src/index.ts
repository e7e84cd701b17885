/**
 * Test helpers shared by the strata packages
 */

export {
  createTempRoot,
  removeDir,
  writeTree,
  setMtime,
  withTempDir,
  withFileStore,
  type FileTree,
} from "./fs.js";
