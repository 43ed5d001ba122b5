/**
 * Storage utilities for S3 operations
 */

import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
} from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";
import { createReadStream, createWriteStream } from "fs";
import { mkdir, stat } from "fs/promises";
import path from "path";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import type { AppConfig } from "./config";

export interface ObjectLocation {
  bucket: string;
  key: string;
}

/**
 * The slice of object storage the pipeline needs. Tests swap in an
 * in-memory implementation.
 */
export interface ObjectStore {
  download(location: ObjectLocation, toPath: string): Promise<number>;
  uploadFile(
    location: ObjectLocation,
    fromPath: string,
    contentType: string,
  ): Promise<void>;
  putText(location: ObjectLocation, text: string): Promise<void>;
  presign(location: ObjectLocation, expiresIn?: number): Promise<string>;
}

export function toUri({ bucket, key }: ObjectLocation): string {
  return `s3://${bucket}/${key}`;
}

export class StorageClient implements ObjectStore {
  private s3: S3Client;

  constructor(config: AppConfig["aws"], s3?: S3Client) {
    this.s3 =
      s3 ??
      new S3Client({
        region: config.region,
        credentials: config.credentials,
      });
  }

  /**
   * Stream an object to a local file, returning its size in bytes
   */
  async download(location: ObjectLocation, toPath: string): Promise<number> {
    try {
      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "download_start",
          bucket: location.bucket,
          key: location.key,
          to: toPath,
        }),
      );

      const response = await this.s3.send(
        new GetObjectCommand({
          Bucket: location.bucket,
          Key: location.key,
        }),
      );

      if (!(response.Body instanceof Readable)) {
        throw new Error("Empty response body");
      }

      await mkdir(path.dirname(toPath), { recursive: true });
      await pipeline(response.Body, createWriteStream(toPath));
      const { size } = await stat(toPath);

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "download_success",
          bucket: location.bucket,
          key: location.key,
          size,
        }),
      );

      return size;
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "download_error",
          bucket: location.bucket,
          key: location.key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }

  /**
   * Upload a local file, replacing any object already at the key
   */
  async uploadFile(
    location: ObjectLocation,
    fromPath: string,
    contentType: string,
  ): Promise<void> {
    try {
      const { size } = await stat(fromPath);

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "upload_file_start",
          bucket: location.bucket,
          key: location.key,
          size,
          content_type: contentType,
        }),
      );

      await this.s3.send(
        new PutObjectCommand({
          Bucket: location.bucket,
          Key: location.key,
          Body: createReadStream(fromPath),
          ContentLength: size,
          ContentType: contentType,
        }),
      );

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "upload_file_success",
          bucket: location.bucket,
          key: location.key,
        }),
      );
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "upload_file_error",
          bucket: location.bucket,
          key: location.key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }

  /**
   * Save a UTF-8 text object
   */
  async putText(location: ObjectLocation, text: string): Promise<void> {
    try {
      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "put_text_start",
          bucket: location.bucket,
          key: location.key,
          size: Buffer.byteLength(text, "utf-8"),
        }),
      );

      await this.s3.send(
        new PutObjectCommand({
          Bucket: location.bucket,
          Key: location.key,
          Body: text,
          ContentType: "text/plain; charset=utf-8",
        }),
      );

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "put_text_success",
          bucket: location.bucket,
          key: location.key,
        }),
      );
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "put_text_error",
          bucket: location.bucket,
          key: location.key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }

  /**
   * Generate a pre-signed URL so the transcription service can read the
   * object without bucket credentials
   */
  async presign(location: ObjectLocation, expiresIn: number = 3600): Promise<string> {
    const command = new GetObjectCommand({
      Bucket: location.bucket,
      Key: location.key,
    });

    try {
      const signedUrl = await getSignedUrl(this.s3, command, { expiresIn });

      console.log(
        JSON.stringify({
          scope: "storage_client",
          action: "signed_url_generated",
          bucket: location.bucket,
          key: location.key,
          expires_in: expiresIn,
        }),
      );

      return signedUrl;
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "storage_client",
          action: "signed_url_error",
          bucket: location.bucket,
          key: location.key,
          error: error instanceof Error ? error.message : error,
        }),
      );
      throw error;
    }
  }
}
