import express, { NextFunction, Request, Response } from "express";
import { Server } from "http";
import { ReportProcessor } from "../controllers/report-processor/index.js";
import { errorMessage } from "../utils/errors.js";
import logger from "../utils/logger.js";

export class HttpServer {
  private app: express.Application;
  private processor: ReportProcessor;
  private port: number;
  private server: Server | null = null;

  constructor(processor: ReportProcessor, port: number = 8080) {
    this.app = express();
    this.processor = processor;
    this.port = port;

    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    this.app.use(express.json());

    // Request logging middleware
    this.app.use((req: Request, res: Response, next: NextFunction) => {
      logger.info(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes() {
    // Health check endpoints used by the Kubernetes probes
    this.app.get("/healthz", (req: Request, res: Response) => {
      res.status(200).send("OK");
    });

    this.app.get("/readyz", (req: Request, res: Response) => {
      if (!this.processor.ready) {
        res.status(503).send("Not Ready");
        return;
      }
      res.status(200).send("Ready");
    });

    this.app.get("/api/v1/status", (req: Request, res: Response) => {
      res.status(200).json(this.processor.getStatus());
    });

    // Run a pass without waiting for the next poll
    this.app.post("/api/v1/poll", async (req: Request, res: Response) => {
      if (this.processor.running) {
        res.status(409).json({ error: "A processing pass is already running" });
        return;
      }
      try {
        const summary = await this.processor.processFiles();
        if (!summary) {
          res
            .status(409)
            .json({ error: "A processing pass is already running" });
          return;
        }
        res.status(200).json(summary);
      } catch (error) {
        logger.error(`Error running requested pass: ${errorMessage(error)}`);
        res.status(500).json({ error: "Internal server error" });
      }
    });
  }

  getApp(): express.Application {
    return this.app;
  }

  start() {
    return new Promise<void>((resolve) => {
      this.server = this.app.listen(this.port, () => {
        logger.info(`HTTP server listening on port ${this.port}`);
        resolve();
      });
    });
  }

  stop() {
    return new Promise<void>((resolve, reject) => {
      if (!this.server) {
        resolve();
        return;
      }
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server = null;
    });
  }
}
