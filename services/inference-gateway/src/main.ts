import express from "express";
import type { Response } from "express";
import morgan from "morgan";
import multer from "multer";

import { loadSettings } from "./config.js";
import { NimClient } from "./nimClient.js";
import { InferenceError, InferenceService } from "./service.js";
import { compareRequestSchema } from "./types.js";
import type { InferenceResult } from "./types.js";

const upload = multer({ limits: { fileSize: 20 * 1024 * 1024 } });

export function createService(): InferenceService {
  const settings = loadSettings();
  return new InferenceService(new NimClient(settings), settings);
}

function sendFailure(res: Response, error: unknown): void {
  if (error instanceof InferenceError) {
    res.status(502).json({ error: error.message, upstreamStatus: error.upstreamStatus });
    return;
  }
  res.status(500).json({ error: (error as Error).message });
}

export function createApp(service: InferenceService = createService()) {
  const app = express();
  app.use(morgan("tiny"));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.post("/vision", upload.single("image"), async (req, res) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: "missing image" });
      return;
    }
    try {
      const result = await service.describeImage(file.buffer, file.mimetype || "application/octet-stream");
      res.json(result satisfies InferenceResult);
    } catch (error) {
      sendFailure(res, error);
    }
  });

  app.post("/compare", express.json({ limit: "2mb" }), async (req, res) => {
    const parseResult = compareRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      res.status(400).json({ errors: parseResult.error.issues });
      return;
    }
    try {
      const result = await service.compare(parseResult.data.observation, parseResult.data.protocol);
      res.json(result satisfies InferenceResult);
    } catch (error) {
      sendFailure(res, error);
    }
  });

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const app = createApp();
  const port = loadSettings().port;
  app.listen(port, () => {
    // eslint-disable-next-line no-console
    console.log(`Inference gateway listening on port ${port}`);
  });
}
