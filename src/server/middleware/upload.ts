import multer from 'multer';

/**
 * In-memory multipart parsing for the single image upload. The bytes go
 * straight to the predictor and are never written to disk.
 */
export function createImageUpload(maxBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxBytes,
      files: 1,
    },
  });
}
