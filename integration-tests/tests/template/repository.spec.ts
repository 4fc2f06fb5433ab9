import { expect } from "chai";
import * as path from "path";
import { ErrorKind, JobError } from "../../../src/job/errors";
import { CommandGitClient, TemplateRepository } from "../../../src/job/handlers/template/repository";
import { FakeGitClient } from "../../helpers/fakes";
import { FakeSpawner } from "../../helpers/fakeProcess";
import { makeTempDir } from "../../helpers/jobContextHelper";

const REPO_URL = "https://example.com/templates.git";

async function createRepository(git: FakeGitClient): Promise<{ repository: TemplateRepository; directory: string }> {
  const directory = path.join(await makeTempDir("repo-"), "templates");
  const repository = new TemplateRepository({ url: REPO_URL, branch: "main", directory, git });
  return { repository, directory };
}

describe("TemplateRepository", () => {
  it("clones when there is no working copy and pulls afterwards", async () => {
    const git = new FakeGitClient();
    const { repository, directory } = await createRepository(git);

    expect(await repository.refresh()).to.deep.equal({ path: directory, action: "cloned" });
    expect(await repository.refresh()).to.deep.equal({ path: directory, action: "pulled" });
    expect(git.calls).to.deep.equal([
      `clone ${REPO_URL} main ${directory}`,
      `pull main ${directory}`,
    ]);
  });

  it("shares one refresh between concurrent callers", async () => {
    const git = new FakeGitClient();
    let release: () => void = () => undefined;
    git.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { repository } = await createRepository(git);

    const first = repository.refresh();
    const second = repository.refresh();
    release();
    const [a, b] = await Promise.all([first, second]);

    expect(a).to.deep.equal(b);
    expect(git.calls).to.have.length(1);
  });

  it("surfaces git failures as catalog refresh failures", async () => {
    const git = new FakeGitClient();
    git.failWith = new Error("could not resolve host");
    const { repository } = await createRepository(git);

    let caught: unknown;
    try {
      await repository.refresh();
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(JobError);
    if (!(caught instanceof JobError)) {
      return;
    }
    expect(caught.kind).to.equal(ErrorKind.CatalogRefreshFailure);
    expect(caught.message).to.equal("Could not access template repo: could not resolve host");
  });
});

describe("CommandGitClient", () => {
  it("runs git with argument lists", async () => {
    const spawner = new FakeSpawner({ exitCode: 0 }, { exitCode: 0 });
    const client = new CommandGitClient(spawner.spawn);
    const directory = path.join(await makeTempDir("git-"), "templates");

    await client.clone(REPO_URL, directory, "main");
    await client.pull(directory, "main");

    expect(spawner.calls.map((call) => [call.command, ...call.args])).to.deep.equal([
      ["git", "clone", "--branch", "main", REPO_URL, directory],
      ["git", "-C", directory, "pull", "origin", "main"],
    ]);
  });

  it("fails on a non-zero exit", async () => {
    const spawner = new FakeSpawner({ stderr: ["fatal: not a git repository"], exitCode: 128 });
    const client = new CommandGitClient(spawner.spawn);

    let message = "";
    try {
      await client.pull("/tmp/nowhere", "main");
    } catch (error) {
      message = error instanceof Error ? error.message : String(error);
    }

    expect(message).to.equal(
      "git -C /tmp/nowhere pull origin main exited with code 128: fatal: not a git repository"
    );
  });
});
