import fs from "node:fs";
import path from "node:path";

// Keep settings reads and writes inside the workspace so tests are hermetic
// and do not depend on the host's ~/.toroid.
const testHome = path.resolve(process.cwd(), ".tmp", "toroid-test-home");
fs.mkdirSync(testHome, { recursive: true });
process.env.TOROID_HOME = testHome;

// Tests pick their own log levels.
delete process.env.LOG_LEVEL;
