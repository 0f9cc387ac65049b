/**
 * CHANGE: Single import site for the Node built-ins the SHELL layer touches
 * WHY: Tests replace child_process through this module
 *
 * `execFile` starts the analyzer without a shell: every argv entry reaches it verbatim.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { execFile } from "node:child_process";
export { promisify } from "node:util";

// node:path and node:fs use `export =`, which `export *` cannot re-export
export const fs = fsNS;
export const path = pathNS;
