import { Router, type RequestHandler } from "express";
import multer from "multer";
import { ValidationError } from "../errors.js";
import { currentUserId } from "../middleware/auth.js";
import type { ImageStore } from "../services/imageStore.js";
import { sendError } from "./respond.js";

const ALLOWED_MIME_TYPES = ["image/jpeg", "image/jpg", "image/png", "image/webp"];

// Files go straight to object storage, nothing is written to local disk
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: 10 * 1024 * 1024,
  },
  fileFilter: (_req, file, cb) => {
    if (ALLOWED_MIME_TYPES.includes(file.mimetype)) {
      cb(null, true);
    } else {
      cb(new ValidationError("Invalid file type. Only JPEG, PNG and WebP images are allowed."));
    }
  },
});

export interface UploadRouterDeps {
  auth: RequestHandler;
  images: ImageStore;
}

export function createUploadRouter({ auth, images }: UploadRouterDeps): Router {
  const router = Router();

  // ============================================
  // Image upload for selfies and garment photos
  // ============================================
  router.post("/image", auth, upload.single("image"), async (req, res) => {
    try {
      const userId = currentUserId(req);
      if (!req.file) {
        throw new ValidationError("No image file provided");
      }

      const url = await images.put(userId, {
        buffer: req.file.buffer,
        originalName: req.file.originalname,
        mimeType: req.file.mimetype,
      });
      res.json({ success: true, url });
    } catch (err: unknown) {
      sendError(res, err, "failed to upload image");
    }
  });

  return router;
}
