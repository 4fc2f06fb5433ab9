/**
 * Template Repository - local working copy of the template source tree
 *
 * refresh() clones the upstream tree when no working copy exists and pulls
 * the configured branch otherwise. Refreshes are serialized with a mutex and
 * concurrent callers share the refresh already in flight.
 */

import { Mutex } from "async-mutex";
import * as fs from "fs/promises";
import * as path from "path";
import * as logger from "firebase-functions/logger";
import { ErrorKind, JobError, errorMessage } from "../../errors";
import { ProcessCommand } from "../../types";
import { SpawnFunction, defaultSpawn, formatCommand, runProcess } from "../../../utils/process";
import { RepoHandle } from "./types";

export interface GitClient {
  clone(url: string, directory: string, branch: string): Promise<void>;
  pull(directory: string, branch: string): Promise<void>;
}

/**
 * Git client that shells out to the `git` binary with argument lists
 */
export class CommandGitClient implements GitClient {
  private spawnFn: SpawnFunction;

  constructor(spawnFn: SpawnFunction = defaultSpawn) {
    this.spawnFn = spawnFn;
  }

  private async run(command: ProcessCommand): Promise<void> {
    const result = await runProcess(command, this.spawnFn);
    if (result.exitCode !== 0) {
      throw new Error(`${formatCommand(command)} exited with code ${result.exitCode}: ${result.output.trim()}`);
    }
  }

  async clone(url: string, directory: string, branch: string): Promise<void> {
    await fs.mkdir(path.dirname(directory), { recursive: true });
    await this.run({
      command: "git",
      args: ["clone", "--branch", branch, url, directory],
    });
  }

  async pull(directory: string, branch: string): Promise<void> {
    await this.run({
      command: "git",
      args: ["-C", directory, "pull", "origin", branch],
    });
  }
}

export interface TemplateRepositoryOptions {
  url: string;
  branch: string;
  directory: string;
  git: GitClient;
}

async function isWorkingCopy(directory: string): Promise<boolean> {
  try {
    await fs.access(path.join(directory, ".git"));
    return true;
  } catch {
    return false;
  }
}

export class TemplateRepository {
  private readonly options: TemplateRepositoryOptions;
  private readonly mutex = new Mutex();
  private inFlight: Promise<RepoHandle> | null = null;

  constructor(options: TemplateRepositoryOptions) {
    this.options = options;
  }

  get directory(): string {
    return this.options.directory;
  }

  /**
   * Synchronizes the working copy with upstream.
   * @throws JobError (CATALOG_REFRESH_FAILURE) when git or the filesystem fails
   */
  refresh(): Promise<RepoHandle> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const refresh = this.mutex
      .runExclusive(() => this.synchronize())
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = refresh;
    return refresh;
  }

  private async synchronize(): Promise<RepoHandle> {
    const { url, branch, directory, git } = this.options;

    try {
      if (await isWorkingCopy(directory)) {
        logger.info(`[Catalog] Pulling latest ${branch} into ${directory}`);
        await git.pull(directory, branch);
        return { path: directory, action: "pulled" };
      }

      logger.info(`[Catalog] Cloning ${url} (${branch}) into ${directory}`);
      await git.clone(url, directory, branch);
      return { path: directory, action: "cloned" };
    } catch (error) {
      logger.error(`[Catalog] Template repository refresh failed:`, error);
      throw new JobError(
        ErrorKind.CatalogRefreshFailure,
        `Could not access template repo: ${errorMessage(error)}`
      );
    }
  }
}
