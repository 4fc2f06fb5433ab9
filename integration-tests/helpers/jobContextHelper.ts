/**
 * Test Helper for creating JobContext instances wired to fakes
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { IConfig, loadConfig } from "../../src/config";
import { JobContext, createJobContext } from "../../src/job/jobContext";
import { SubstringTemplateMatcher, TemplateMatcher } from "../../src/job/handlers/template/matcher";
import { TemplateRepository } from "../../src/job/handlers/template/repository";
import { CatalogIndex } from "../../src/job/handlers/template/types";
import { FakeGitClient, FakeObjectStore } from "./fakes";
import { FakeSpawner } from "./fakeProcess";

export const FIXTURES_DIR = path.join(__dirname, "..", "fixtures");
export const TEMPLATE_MAPPING_FIXTURE = path.join(FIXTURES_DIR, "template_mapping.json");

export interface TestJobContext {
  context: JobContext;
  git: FakeGitClient;
  store: FakeObjectStore;
  spawner: FakeSpawner;
  repoDir: string;
}

export interface TestJobContextOptions {
  config?: Partial<IConfig>;
  spawner?: FakeSpawner;
  matcher?: TemplateMatcher;
  catalog?: CatalogIndex;
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/**
 * Deletes every directory made by makeTempDir so far
 */
export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
}

/**
 * Builds a context around fakes. The repository lives in a fresh temp dir and
 * the catalog is read from the fixture mapping file unless one is given.
 */
export async function createTestJobContext(options: TestJobContextOptions = {}): Promise<TestJobContext> {
  const repoDir = path.join(await makeTempDir("templates-"), "repo");
  const config: IConfig = {
    ...loadConfig({}),
    projectId: "test-project",
    templateRepoDir: repoDir,
    templateMappingPath: TEMPLATE_MAPPING_FIXTURE,
    jobSourceLabel: "test-dispatcher",
    streamingKillGraceMs: 20,
    ...options.config,
  };

  const git = new FakeGitClient();
  const store = new FakeObjectStore();
  const spawner = options.spawner ?? new FakeSpawner();
  const catalog = options.catalog;

  const context = createJobContext({
    config,
    repository: new TemplateRepository({
      url: config.templateRepoUrl,
      branch: config.templateRepoBranch,
      directory: repoDir,
      git,
    }),
    matcher: options.matcher ?? new SubstringTemplateMatcher(),
    objectStore: store,
    spawnFn: spawner.spawn,
    loadCatalog: catalog ? async () => catalog : undefined,
  });

  return { context, git, store, spawner, repoDir };
}
