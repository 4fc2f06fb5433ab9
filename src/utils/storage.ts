import { Bucket, Storage } from "@google-cloud/storage";
import * as fs from "fs/promises";

/**
 * Object storage used for archiving generated sources and reading mapping files.
 */
export interface ObjectStore {
  upload(bucketName: string, objectPath: string, contents: string, contentType: string): Promise<void>;
  download(bucketName: string, objectPath: string): Promise<string>;
}

export class GcsObjectStore implements ObjectStore {
  private storage: Storage;

  constructor(storage: Storage) {
    this.storage = storage;
  }

  private getBucketByName(bucketName: string): Bucket {
    return this.storage.bucket(bucketName);
  }

  async upload(bucketName: string, objectPath: string, contents: string, contentType: string): Promise<void> {
    const file = this.getBucketByName(bucketName).file(objectPath);
    await file.save(contents, { contentType, resumable: false });
  }

  async download(bucketName: string, objectPath: string): Promise<string> {
    const file = this.getBucketByName(bucketName).file(objectPath);
    const [exists] = await file.exists();
    if (!exists) {
      throw new Error(`Object not found at gs://${bucketName}/${objectPath}`);
    }
    const [contents] = await file.download();
    return contents.toString("utf-8");
  }
}

export function isGcsUri(uri: string): boolean {
  return uri.startsWith("gs://");
}

/**
 * Splits `gs://bucket/some/prefix` into `["bucket", "some/prefix"]`.
 */
export function parseGcsUri(uri: string): [string, string] {
  const match = uri.match(/^gs:\/\/([^/]+)\/?(.*)$/);
  if (!match) {
    throw new Error(`Invalid path format: ${uri}. Expected format: gs://{bucket-name}/{object path}`);
  }
  const objectPath = match[2].replace(/\/+$/, "");
  return [match[1], objectPath];
}

/**
 * Joins URI or object-path segments with single slashes.
 */
export function joinObjectPath(...segments: string[]): string {
  return segments
    .filter((segment) => segment.length > 0)
    .map((segment, index) => {
      const trimmedEnd = segment.replace(/\/+$/, "");
      return index === 0 ? trimmedEnd : trimmedEnd.replace(/^\/+/, "");
    })
    .join("/");
}

/**
 * Reads a text file from Cloud Storage (`gs://` URIs) or the local filesystem.
 */
export async function readTextFile(location: string, store?: ObjectStore): Promise<string> {
  if (isGcsUri(location)) {
    if (!store) {
      throw new Error(`No object store configured to read ${location}`);
    }
    const [bucketName, objectPath] = parseGcsUri(location);
    return store.download(bucketName, objectPath);
  }
  return fs.readFile(location, "utf-8");
}
