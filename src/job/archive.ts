import * as crypto from "crypto";
import { ObjectStore, joinObjectPath, parseGcsUri } from "../utils/storage";

export const ARCHIVE_FOLDER = "generated_pipelines";
export const ARCHIVE_CONTENT_TYPE = "text/x-python";

export interface ArchiveLocation {
  bucketName: string;
  objectPath: string;
  uri: string;
}

/**
 * `gs://bucket/prefix` + `my-job` -> `gs://bucket/prefix/generated_pipelines/my-job-<8 hex>.py`
 */
export function buildArchiveLocation(
  storageLocation: string,
  jobName: string,
  suffix: string = crypto.randomBytes(4).toString("hex")
): ArchiveLocation {
  const [bucketName, prefix] = parseGcsUri(storageLocation);
  const objectPath = joinObjectPath(prefix, ARCHIVE_FOLDER, `${jobName}-${suffix}.py`);
  return {
    bucketName,
    objectPath,
    uri: `gs://${bucketName}/${objectPath}`,
  };
}

/**
 * Uploads a program source next to the job's storage location.
 * @returns the gs:// URI of the archived copy
 */
export async function archiveProgramSource(
  store: ObjectStore,
  storageLocation: string,
  jobName: string,
  programSource: string
): Promise<string> {
  const location = buildArchiveLocation(storageLocation, jobName);
  await store.upload(location.bucketName, location.objectPath, programSource, ARCHIVE_CONTENT_TYPE);
  return location.uri;
}
