import dotenv from "dotenv";
import express from "express";
import { createRoutes, sendError } from "./routes";
import { AppConfig, loadConfig } from "../utils/config";

dotenv.config();

export function createApp(config: AppConfig): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "5mb" }));
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
  app.use("/api", createRoutes(config));

  // Root endpoint
  app.get("/", (req, res) => {
    res.json({
      message: "Glidepath Portfolio Planner API",
      version: "1.0.0",
      endpoints: {
        analyze: "POST /api/analyze",
        rebalance: "POST /api/rebalance",
        projection: "POST /api/projection",
        glidepath: "POST /api/glidepath/validate",
        health: "GET /api/health",
      },
    });
  });

  // Error handling middleware
  app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    // body-parser rejects malformed JSON with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" });
      return;
    }
    sendError(res, "request", err);
  });

  return app;
}

const config = loadConfig();
const app = createApp(config);

// Start server
if (require.main === module) {
  app.listen(config.port, () => {
    console.log(`Server running on port ${config.port}`);
    console.log(`API available at http://localhost:${config.port}/api`);
  });
}

export default app;
