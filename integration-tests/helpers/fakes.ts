/**
 * In-process fakes for the external collaborators of a job context
 */

import * as fs from "fs/promises";
import * as path from "path";
import { CompletionService } from "../../src/utils/completion";
import { ObjectStore } from "../../src/utils/storage";
import { GitClient } from "../../src/job/handlers/template/repository";

export interface StoredObject {
  bucketName: string;
  objectPath: string;
  contents: string;
  contentType: string;
}

export class FakeObjectStore implements ObjectStore {
  readonly uploads: StoredObject[] = [];
  readonly objects = new Map<string, string>();
  failUploadsWith?: Error;

  async upload(bucketName: string, objectPath: string, contents: string, contentType: string): Promise<void> {
    if (this.failUploadsWith) {
      throw this.failUploadsWith;
    }
    this.uploads.push({ bucketName, objectPath, contents, contentType });
    this.objects.set(`${bucketName}/${objectPath}`, contents);
  }

  async download(bucketName: string, objectPath: string): Promise<string> {
    const contents = this.objects.get(`${bucketName}/${objectPath}`);
    if (contents === undefined) {
      throw new Error(`Object not found at gs://${bucketName}/${objectPath}`);
    }
    return contents;
  }
}

/**
 * Records git operations. A clone creates the `.git` marker so the next
 * refresh sees a working copy.
 */
export class FakeGitClient implements GitClient {
  readonly calls: string[] = [];
  failWith?: Error;
  /** Resolves pending operations when set; lets tests hold a refresh open */
  gate?: Promise<void>;

  async clone(url: string, directory: string, branch: string): Promise<void> {
    this.calls.push(`clone ${url} ${branch} ${directory}`);
    await this.gate;
    if (this.failWith) {
      throw this.failWith;
    }
    await fs.mkdir(path.join(directory, ".git"), { recursive: true });
  }

  async pull(directory: string, branch: string): Promise<void> {
    this.calls.push(`pull ${branch} ${directory}`);
    await this.gate;
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

export class FakeCompletionService implements CompletionService {
  readonly requests: Array<{ systemInstruction: string; prompt: string }> = [];

  constructor(private readonly reply: string | Error) {}

  async complete(systemInstruction: string, prompt: string): Promise<string> {
    this.requests.push({ systemInstruction, prompt });
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}
