import path from "node:path";
import { randomUUID } from "node:crypto";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { logger } from "../logger.js";

export interface UploadedImage {
  buffer: Buffer;
  originalName: string;
  mimeType: string;
}

/** Where user selfies and garment photos go before they are handed to a model. */
export interface ImageStore {
  put(userId: string, image: UploadedImage): Promise<string>;
}

export class S3ImageStore implements ImageStore {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly region: string
  ) {}

  async put(userId: string, image: UploadedImage): Promise<string> {
    const extension = path.extname(image.originalName).toLowerCase();
    const key = `uploads/${userId}/${Date.now()}-${randomUUID()}${extension}`;

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: image.buffer,
        ContentType: image.mimeType || `image/${extension.slice(1)}`,
        ACL: "public-read",
      })
    );

    const url = `https://${this.bucket}.s3.${this.region}.amazonaws.com/${key}`;
    logger.info({ key, url }, "Image uploaded to S3");
    return url;
  }
}

export function createS3ImageStore(bucket: string, region: string): S3ImageStore {
  return new S3ImageStore(new S3Client({ region }), bucket, region);
}
