// Polyfills load first: pdfjs-dist expects DOMMatrix at import time.
import "./bankruptcy/layout/polyfills";

// Validate environment variables before anything else
import { validateEnv } from "./config/env";
const env = validateEnv();

import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import { createServer } from "http";
import { registerRoutes } from "./routes";
import { logger, logRequest, createLogger } from "./logger";

const log = createLogger("server");

const app = express();

// Trust the first proxy so express-rate-limit sees the client address.
app.set("trust proxy", 1);

app.use(helmet({
  contentSecurityPolicy: env.NODE_ENV === "production" ? {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  } : false,
  hsts: env.NODE_ENV === "production" ? {
    maxAge: 31536000,
    includeSubDomains: true,
    preload: true,
  } : false,
  frameguard: { action: "deny" },
  noSniff: true,
}));

const allowedOrigins = env.ALLOWED_ORIGINS
  ? env.ALLOWED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
  : [];

app.use(cors({
  origin: (origin, callback) => {
    // Requests without an origin (curl, server-to-server)
    if (!origin) return callback(null, true);

    if (env.NODE_ENV !== "production") {
      return callback(null, true);
    }

    if (allowedOrigins.length === 0) {
      log.warn("CORS: No allowed origins configured in production", { origin });
      return callback(new Error("Not allowed by CORS - configure ALLOWED_ORIGINS"));
    }

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else {
      log.warn("CORS blocked request from unauthorized origin", { origin, allowedOrigins });
      callback(new Error("Not allowed by CORS"));
    }
  },
  methods: ["GET", "POST", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Accept"],
}));

const httpServer = createServer(app);

// Request logging (registered first for accurate timing)
app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: Record<string, unknown> | undefined = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson, ...args) {
    capturedJsonResponse = bodyJson;
    return originalResJson.apply(res, [bodyJson, ...args]);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      logRequest(req.method, path, res.statusCode, duration, capturedJsonResponse);
    }
  });

  next();
});

app.use(compression({
  threshold: 1024,
  level: 6,
}));

async function start(): Promise<void> {
  await registerRoutes(httpServer, app, {
    maxUploadMb: env.MAX_UPLOAD_MB,
    tmpDir: env.ISOLATION_TMP_DIR,
  });

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    log.error("Unhandled request error", { status, error: err.message, stack: err.stack });
    res.status(status).json({ success: false, message: status === 500 ? "Internal Server Error" : err.message });
  });

  const port = parseInt(env.PORT, 10);
  httpServer.listen(port, () => {
    logger.info("Server started", { port, env: env.NODE_ENV });
  });
}

start().catch((error: unknown) => {
  logger.error("Server failed to start", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
