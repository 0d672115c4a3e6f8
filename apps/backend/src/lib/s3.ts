import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { env } from "../config/env.js";

const endpoint = env.S3_ENDPOINT;

export const s3Client = new S3Client({
  region: env.S3_REGION,
  endpoint,
  forcePathStyle: Boolean(endpoint),
  credentials: {
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY
  }
});

export type ImageStore = {
  put: (key: string, body: Buffer, contentType: string) => Promise<void>;
  url: (key: string) => Promise<string>;
  remove: (key: string) => Promise<void>;
};

export const s3ImageStore: ImageStore = {
  put: async (key, body, contentType) => {
    await s3Client.send(
      new PutObjectCommand({
        Bucket: env.S3_BUCKET,
        Key: key,
        Body: body,
        ContentType: contentType,
        CacheControl: "public, max-age=31536000, immutable"
      })
    );
  },
  url: async (key) => {
    if (env.S3_PUBLIC_BASE_URL) {
      return `${env.S3_PUBLIC_BASE_URL.replace(/\/$/, "")}/${key}`;
    }

    return getSignedUrl(
      s3Client,
      new GetObjectCommand({
        Bucket: env.S3_BUCKET,
        Key: key
      }),
      { expiresIn: 3600 }
    );
  },
  remove: async (key) => {
    await s3Client.send(
      new DeleteObjectCommand({
        Bucket: env.S3_BUCKET,
        Key: key
      })
    );
  }
};
