import { Router } from "express";
import multer from "multer";
import { randomUUID } from "crypto";
import { extname } from "path";
import { mkdirSync } from "fs";
import { ConversionController } from "../controllers/conversion.controller";
import { isSupportedDocument } from "../../application/use-cases/submit-conversion.use-case";
import { UnsupportedFileTypeError } from "../../domain/errors/conversion.errors";

export interface ConversionRoutesOptions {
  uploadDir: string;
  maxUploadBytes: number;
}

export function createDocumentUpload(options: ConversionRoutesOptions): multer.Multer {
  mkdirSync(options.uploadDir, { recursive: true });

  return multer({
    storage: multer.diskStorage({
      destination: options.uploadDir,
      // Unique on-disk name; the original name is kept on the job
      filename: (_req, file, cb) => {
        cb(null, `${randomUUID()}${extname(file.originalname).toLowerCase()}`);
      },
    }),
    limits: {
      fileSize: options.maxUploadBytes,
    },
    fileFilter: (_req, file, cb) => {
      if (isSupportedDocument(file.originalname)) {
        cb(null, true);
      } else {
        cb(new UnsupportedFileTypeError(extname(file.originalname).toLowerCase() || file.originalname));
      }
    },
  });
}

export function createConversionRoutes(
  conversionController: ConversionController,
  options: ConversionRoutesOptions
): Router {
  const router = Router();
  const upload = createDocumentUpload(options);

  // List all known jobs, most recent first
  router.get("/", (req, res) => conversionController.listJobs(req, res));

  // Upload a document and start converting it in the background
  router.post("/", upload.single("file"), (req, res) => conversionController.submitConversion(req, res));

  router.get("/:jobId/status", (req, res) => conversionController.getStatus(req, res));

  router.get("/:jobId/download", (req, res) => conversionController.download(req, res));

  // Cancel a queued or running job
  router.delete("/:jobId", (req, res) => conversionController.cancel(req, res));

  return router;
}

export function createVoiceRoutes(conversionController: ConversionController): Router {
  const router = Router();
  router.get("/", (req, res) => conversionController.getVoices(req, res));
  return router;
}
