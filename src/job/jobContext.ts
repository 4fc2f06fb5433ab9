/**
 * Job Context for Handlers
 *
 * Carries the configuration and every external collaborator a handler may
 * need. Built once by the entry point and passed to each dispatched handler.
 */

import { IConfig } from "../config";
import { SpawnFunction, defaultSpawn } from "../utils/process";
import { ObjectStore } from "../utils/storage";
import { loadCatalogIndex } from "./handlers/template/catalog";
import { TemplateMatcher } from "./handlers/template/matcher";
import { TemplateRepository } from "./handlers/template/repository";
import { CatalogIndex } from "./handlers/template/types";

export interface JobContext {
  readonly config: IConfig;

  /** Verbose logging flag */
  readonly verbose: boolean;

  /** Working copy of the template source tree */
  readonly repository: TemplateRepository;

  readonly matcher: TemplateMatcher;

  readonly objectStore: ObjectStore;

  /** Process launcher for every external command */
  readonly spawnFn: SpawnFunction;

  /** Reads the catalog mapping file */
  loadCatalog(): Promise<CatalogIndex>;
}

export interface JobContextDependencies {
  config: IConfig;
  repository: TemplateRepository;
  matcher: TemplateMatcher;
  objectStore: ObjectStore;
  spawnFn?: SpawnFunction;
  /** Overrides reading the mapping file at `config.templateMappingPath` */
  loadCatalog?: () => Promise<CatalogIndex>;
}

export function createJobContext(deps: JobContextDependencies): JobContext {
  const { config, objectStore } = deps;

  return {
    config,
    verbose: config.verbose,
    repository: deps.repository,
    matcher: deps.matcher,
    objectStore,
    spawnFn: deps.spawnFn ?? defaultSpawn,

    loadCatalog(): Promise<CatalogIndex> {
      if (deps.loadCatalog) {
        return deps.loadCatalog();
      }
      return loadCatalogIndex(config.templateMappingPath, objectStore);
    },
  };
}
