/**
 * Status Server - Express server reporting the installation state
 *
 * Deployed next to the staged runtime libraries, it answers whether the
 * runtime library directory made it into the bundle and whether the
 * built module imports from it.
 *
 * Routes:
 * - GET /        installation report
 * - GET /health  liveness
 */

import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import morgan from "morgan";
import type { Server } from "node:http";
import type { InstallationReport } from "@avbuild/build-schema";
import { PythonToolchain, inspectInstallation, spawnRunner } from "@avbuild/build-pipeline";

export interface ServerOptions {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Runtime library directory in the deployed runtime */
  runtimeLibDir: string;
  /** Python interpreter used for the import probe */
  python: string;
  /** Module imported by the probe */
  moduleName: string;
  /** Enable verbose logging */
  verbose: boolean;
  /** Produces the report; defaults to probing with `python` */
  inspect?: () => Promise<InstallationReport>;
}

/**
 * Create and configure the Express server
 */
export function createServer(options: ServerOptions): Express {
  const app = express();

  app.use(cors());

  // Request logging
  if (options.verbose) {
    app.use(morgan("dev"));
  } else {
    // Minimal logging - only log non-200 responses
    app.use(
      morgan("dev", {
        skip: (_req: Request, res: Response) => res.statusCode < 400,
      })
    );
  }

  const inspect =
    options.inspect ??
    (() =>
      inspectInstallation({
        runtimeLibDir: options.runtimeLibDir,
        moduleName: options.moduleName,
        python: new PythonToolchain(spawnRunner, options.python),
      }));

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // The report is the payload even when the module fails to load
  app.get("/", (_req: Request, res: Response, next: NextFunction) => {
    inspect()
      .then((report) => {
        res.json(report);
      })
      .catch(next);
  });

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: "Not found",
      path: req.path,
    });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error("[status-server] Error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err.message,
    });
  });

  return app;
}

/**
 * Start the server
 */
export function startServer(options: ServerOptions): Server {
  const app = createServer(options);

  return app.listen(options.port, () => {
    console.log(`\n🚀 Status server running at http://localhost:${options.port}`);
    console.log(`   Runtime libraries: ${options.runtimeLibDir}`);
    console.log(`   Probing module: ${options.moduleName} with ${options.python}\n`);
  });
}
