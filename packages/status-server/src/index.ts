#!/usr/bin/env tsx
/**
 * Status Server Entry Point
 *
 * Usage:
 *   npm start -w @avbuild/status-server
 *   PORT=4000 npm start -w @avbuild/status-server
 *   VERBOSE=true npm start -w @avbuild/status-server
 */

import { startServer } from "./server.js";

// Configuration from environment
const port = parseInt(process.env.PORT || "3001", 10);
const verbose = process.env.VERBOSE === "true" || process.env.VERBOSE === "1";

startServer({
  port,
  runtimeLibDir: process.env.RUNTIME_LIB_DIR || "/var/task/lib_native",
  python: process.env.PYTHON || "python3",
  moduleName: process.env.MODULE_NAME || "av",
  verbose,
});
