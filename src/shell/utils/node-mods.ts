// Node built-ins used by the shell, re-exported from one place
// PURITY: SHELL

import * as fsNS from "node:fs";
import * as fsPromisesNS from "node:fs/promises";
import * as pathNS from "node:path";

export { execFile, spawn } from "node:child_process";
export { fileURLToPath } from "node:url";
export { promisify } from "node:util";

// node:path and node:fs use `export =`, which `export *` cannot re-export.
export const fs = fsNS;
export const fsp = fsPromisesNS;
export const path = pathNS;
