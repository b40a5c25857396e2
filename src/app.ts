import express, { Express } from "express";
import cors from "cors";
import { ConversionController } from "./presentation/controllers/conversion.controller";
import {
  ConversionRoutesOptions,
  createConversionRoutes,
  createVoiceRoutes,
} from "./presentation/routes/conversion.routes";
import { errorMiddleware } from "./presentation/middleware/error.middleware";

export function createApp(conversionController: ConversionController, options: ConversionRoutesOptions): Express {
  const app = express();

  // Enable CORS for all origins
  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get("/health", (req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // Routes
  app.use("/api/conversions", createConversionRoutes(conversionController, options));
  app.use("/api/voices", createVoiceRoutes(conversionController));

  // Error handling middleware (upload limits, rejected file types)
  app.use(errorMiddleware);

  return app;
}
