import express from "express";
import { loadConfig } from "../config";
import { ReferenceTableCache } from "../tables/tableCache";
import { FileTableProvider } from "../tables/tableProvider";
import { createRoutes } from "./routes";

export function createApp(tableCache: ReferenceTableCache): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // CORS headers for development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Origin, X-Requested-With, Content-Type, Accept");
    if (req.method === "OPTIONS") {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Routes
  app.use("/api", createRoutes(tableCache));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Forensic Economic Loss API",
      version: "1.0.0",
      endpoints: {
        run: "POST /api/cases/run",
        report: "POST /api/cases/report",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: Error, req: express.Request, res: express.Response, next: express.NextFunction) => {
    console.error("Unhandled error:", err);
    res.status(500).json({
      error: "Internal server error",
      message: err.message,
    });
  });

  return app;
}

const config = loadConfig();
const app = createApp(new ReferenceTableCache(new FileTableProvider(config.tablesDir)));

// Start server
if (require.main === module) {
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
  });
}

export default app;
