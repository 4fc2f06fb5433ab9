import { expect } from "chai";
import * as fs from "fs/promises";
import * as path from "path";
import { dispatch, validateRequestInput } from "../../../src/job/dispatch";
import { ErrorKind } from "../../../src/job/errors";
import { HANDLER_REGISTRY } from "../../../src/job/handlers/registry";
import { VertexTemplateMatcher } from "../../../src/job/handlers/template/matcher";
import { JobStatus } from "../../../src/job/types";
import { FakeCompletionService } from "../../helpers/fakes";
import { FakeSpawner } from "../../helpers/fakeProcess";
import { createTestJobContext } from "../../helpers/jobContextHelper";

const JOB_ID = "2024-05-01_03_15_30-5550001";

describe("dispatch", () => {
  describe("routing", () => {
    it("rejects an unknown service", async () => {
      const { context } = await createTestJobContext();

      const response = await dispatch({ service: "cluster", command: "resize" }, context);

      expect(response).to.deep.equal({
        status: "error",
        kind: ErrorKind.MalformedInput,
        report: "Unsupported service: cluster. Available services: pipeline, template",
      });
    });

    it("rejects an unknown command", async () => {
      const { context } = await createTestJobContext();

      const response = await dispatch({ service: "template", command: "delete" }, context);

      expect(response.report).to.equal("Unsupported command: template/delete. Available commands for template: find, stage, submit");
    });

    it("does not route to inherited object keys", () => {
      expect(validateRequestInput("template", "toString", {})).to.deep.equal([
        "Unsupported command: template/toString. Available commands for template: find, stage, submit",
      ]);
    });
  });

  describe("input validation", () => {
    it("reports missing required input", () => {
      expect(validateRequestInput("template", "submit", { projectId: "p", region: "r" })).to.deep.equal([
        "Input (template/submit): must have required property 'jobName'",
      ]);
    });

    it("rejects unknown input keys before the handler runs", async () => {
      const { context, spawner } = await createTestJobContext();

      const response = await dispatch(
        { service: "template", command: "submit", input: { jobName: "j", projectId: "p", region: "r", color: "red" } },
        context
      );

      expect(response).to.deep.equal({
        status: "error",
        kind: ErrorKind.MalformedInput,
        report: "Input (template/submit): must NOT have additional properties",
      });
      expect(spawner.calls).to.have.length(0);
    });

    it("does not accept a temp location for template submissions", () => {
      expect(validateRequestInput("template", "submit", {
        jobName: "j",
        projectId: "p",
        region: "r",
        tempLocation: "gs://test-bucket/temp",
      })).to.deep.equal(["Input (template/submit): must NOT have additional properties"]);
    });

    it("gives every registered command a description and a schema covering its required input", () => {
      for (const service of Object.keys(HANDLER_REGISTRY)) {
        for (const [command, definition] of Object.entries(HANDLER_REGISTRY[service])) {
          expect(definition.description, `${service}/${command}`).to.not.equal("");
          expect(Object.keys(definition.inputSchema.properties), `${service}/${command}`)
            .to.include.members(definition.inputSchema.required);
        }
      }
    });

    it("rejects storage locations outside Cloud Storage", () => {
      const errors = validateRequestInput("pipeline", "run", {
        programSource: "print(1)",
        mode: "BATCH",
        projectId: "p",
        region: "r",
        storageLocation: "s3://bucket/x",
        jobName: "j",
      });

      expect(errors).to.deep.equal(['Input (pipeline/run): /storageLocation must match pattern "^gs://"']);
    });
  });

  describe("template/find", () => {
    it("returns the matched definition", async () => {
      const { context, git } = await createTestJobContext();

      const response = await dispatch(
        { service: "template", command: "find", input: { taskDescription: "count words in my text file", refresh: false } },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Success,
        report: "Matched template 'Word_Count'.",
        template: {
          name: "Word_Count",
          description: "Batch pipeline that counts words in a text file stored in Cloud Storage",
          params: { required: ["inputFile", "output"], optional: [] },
          template_gcs_path: "gs://dataflow-templates-us-central1/latest/Word_Count",
          type: "CLASSIC",
        },
      });
      expect(git.calls).to.have.length(0);
    });

    it("refreshes the source tree by default", async () => {
      const { context, git, repoDir } = await createTestJobContext();

      await dispatch({ service: "template", command: "find", input: { taskDescription: "count words" } }, context);

      expect(git.calls).to.deep.equal([`clone ${context.config.templateRepoUrl} main ${repoDir}`]);
    });

    it("fails with NO_MATCHING_TEMPLATE when nothing fits", async () => {
      const { context } = await createTestJobContext();

      const response = await dispatch(
        { service: "template", command: "find", input: { taskDescription: "resize the cluster", refresh: false } },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Failed,
        kind: ErrorKind.NoMatchingTemplate,
        report: "No template in the catalog matches the task description.",
      });
    });
  });

  describe("template/submit", () => {
    it("submits a classic catalog template by name", async () => {
      const spawner = new FakeSpawner({ stdout: [`id: '${JOB_ID}'\n`], exitCode: 0 });
      const { context } = await createTestJobContext({ spawner });

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "Count Words",
            projectId: "test-project",
            region: "us-central1",
            templateName: "Word_Count",
            parameters: { inputFile: "gs://in/book.txt", output: "gs://out/counts" },
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Success,
        report: `Job 'count-words' submitted successfully. Job ID: ${JOB_ID}`,
        job_id: JOB_ID,
        details: { name: "count-words", id: JOB_ID },
      });
      expect(spawner.lastCall.args).to.deep.equal([
        "dataflow", "jobs", "run", "count-words",
        "--project=test-project",
        "--region=us-central1",
        "--gcs-location=gs://dataflow-templates-us-central1/latest/Word_Count",
        "--parameters=^~^inputFile=gs://in/book.txt~output=gs://out/counts",
        "--staging-location=gs://test-bucket/staging",
        "--additional-user-labels=source=test-dispatcher",
      ]);
    });

    it("submits a flex template from a definition string", async () => {
      const spawner = new FakeSpawner({ stdout: [`id: '${JOB_ID}'\n`], exitCode: 0 });
      const { context, git } = await createTestJobContext({ spawner });
      const definition = JSON.stringify([{
        name: "Text_To_BQ",
        description: "Text to BigQuery",
        template_gcs_path: "gs://test-bucket/templates/flex/Text_To_BQ",
        params: { required: ["inputFilePattern"], optional: [] },
      }]);

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "text-to-bq",
            projectId: "test-project",
            region: "us-central1",
            templateDefinition: definition,
            parameters: '{"inputFilePattern": "gs://in/*.txt"}',
          },
        },
        context
      );

      expect(response.status).to.equal(JobStatus.Success);
      expect(spawner.lastCall.args.slice(0, 3)).to.deep.equal(["dataflow", "flex-template", "run"]);
      expect(spawner.lastCall.args).to.include("--template-file-gcs-location=gs://test-bucket/templates/flex/Text_To_BQ");
      expect(spawner.lastCall.args.some((arg) => arg.startsWith("--staging-location"))).to.be.false;
      expect(git.calls).to.have.length(0);
    });

    it("resolves a task description through the matcher", async () => {
      const spawner = new FakeSpawner({ stdout: [`id: '${JOB_ID}'\n`], exitCode: 0 });
      const completion = new FakeCompletionService('{"name": "Cloud_PubSub_to_GCS_Text"}');
      const { context } = await createTestJobContext({ spawner, matcher: new VertexTemplateMatcher(completion) });

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "events-archive",
            projectId: "test-project",
            region: "us-central1",
            taskDescription: "archive Pub/Sub events as text files",
            parameters: {
              inputTopic: "projects/test-project/topics/events",
              outputDirectory: "gs://out/events/",
              outputFilenamePrefix: "events-",
            },
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response.job_id).to.equal(JOB_ID);
      expect(completion.requests).to.have.length(1);
      expect(spawner.lastCall.args).to.include(
        "--gcs-location=gs://dataflow-templates-us-central1/latest/Cloud_PubSub_to_GCS_Text"
      );
    });

    it("runs a language-variant launcher from the refreshed source tree", async () => {
      const spawner = new FakeSpawner({ stdout: ["Batch [jdbc-copy-7f3a] submitted.\n"], exitCode: 0 });
      const { context, git, repoDir } = await createTestJobContext({ spawner });

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "jdbc-copy",
            projectId: "test-project",
            region: "us-central1",
            templateName: "JDBCTOBIGQUERY",
            parameters: {
              "jdbctobq.input.url": "jdbc:mysql://db/shop",
              "jdbctobq.input.table": "orders",
              "jdbctobq.output.dataset": "shop",
            },
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response.job_id).to.equal("jdbc-copy-7f3a");
      expect(git.calls).to.have.length(1);
      expect(spawner.lastCall.command).to.equal("./bin/start.sh");
      expect(spawner.lastCall.cwd).to.equal(path.join(repoDir, "python"));
    });

    it("refreshes the source tree for a language-variant definition", async () => {
      const spawner = new FakeSpawner({ stdout: ["Batch [jdbc-copy-1] submitted.\n"], exitCode: 0 });
      const { context, git, repoDir } = await createTestJobContext({ spawner });
      const definition = JSON.stringify([{
        name: "JDBCTOGCS",
        description: "JDBC to Cloud Storage",
        execution_path: "./bin/start.sh",
        type: "LANGUAGE_VARIANT",
        language: "JAVA",
        params: { required: [], optional: [] },
      }]);

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "jdbc-copy",
            projectId: "test-project",
            region: "us-central1",
            templateDefinition: definition,
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response.job_id).to.equal("jdbc-copy-1");
      expect(git.calls).to.deep.equal([`clone ${context.config.templateRepoUrl} main ${repoDir}`]);
      expect(spawner.lastCall.cwd).to.equal(path.join(repoDir, "java"));
    });

    it("does not launch anything when a required parameter is missing", async () => {
      const { context, spawner } = await createTestJobContext();

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "count-words",
            projectId: "test-project",
            region: "us-central1",
            templateName: "Word_Count",
            parameters: { inputFile: "gs://in/book.txt" },
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Failed,
        kind: ErrorKind.MissingRequiredParameter,
        report: "Job could not be submitted due to a parameter validation error: Missing required param(s): ['output']",
      });
      expect(spawner.calls).to.have.length(0);
    });

    it("fails with MISSING_TEMPLATE_PATH for an unpublished template", async () => {
      const { context, spawner } = await createTestJobContext();

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: {
            jobName: "pending",
            projectId: "test-project",
            region: "us-central1",
            templateName: "Template_Without_Path",
            parameters: { input: "gs://in/x" },
            stagingLocation: "gs://test-bucket/staging",
          },
        },
        context
      );

      expect(response.kind).to.equal(ErrorKind.MissingTemplatePath);
      expect(spawner.calls).to.have.length(0);
    });

    it("fails with NO_MATCHING_TEMPLATE for a name outside the catalog", async () => {
      const { context } = await createTestJobContext();

      const response = await dispatch(
        {
          service: "template",
          command: "submit",
          input: { jobName: "j", projectId: "p", region: "r", templateName: "Nope" },
        },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Failed,
        kind: ErrorKind.NoMatchingTemplate,
        report: "Template 'Nope' is not in the catalog.",
      });
    });
  });

  describe("template/stage", () => {
    it("returns the staged path", async () => {
      const spawner = new FakeSpawner({
        stdout: ["Flex Template was staged! gs://test-bucket/templates/flex/Word_Count\n"],
        exitCode: 0,
      });
      const { context, repoDir } = await createTestJobContext({ spawner });
      await fs.mkdir(path.join(repoDir, "v1", "word-count"), { recursive: true });

      const response = await dispatch(
        {
          service: "template",
          command: "stage",
          input: {
            projectId: "test-project",
            bucketName: "test-bucket",
            templateName: "Word_Count",
            templatePath: "v1/word-count",
          },
        },
        context
      );

      expect(response).to.deep.equal({
        status: JobStatus.Success,
        report: "Template 'Word_Count' was built and staged.",
        staged_template_gcs_path: "gs://test-bucket/templates/flex/Word_Count",
      });
    });
  });

  describe("pipeline/run", () => {
    it("runs the program and archives it", async () => {
      const spawner = new FakeSpawner({ stdout: [`id: '${JOB_ID}'\n`], exitCode: 0 });
      const { context, store } = await createTestJobContext({ spawner });

      const response = await dispatch(
        {
          service: "pipeline",
          command: "run",
          input: {
            programSource: "print('pipeline')\n",
            mode: "batch",
            projectId: "test-project",
            region: "us-central1",
            storageLocation: "gs://test-bucket/pipelines",
            jobName: "adhoc-copy",
            runtimeArgs: '{"input": "gs://in/a.csv", "num_workers": 3}',
          },
        },
        context
      );

      expect(response.status).to.equal(JobStatus.Success);
      expect(response.job_id).to.equal(JOB_ID);
      expect(response.gcs_script_path).to.equal(`gs://test-bucket/${store.uploads[0].objectPath}`);
      expect(spawner.lastCall.command).to.equal("python3");
      expect(spawner.lastCall.args.slice(-4)).to.deep.equal(["--input", "gs://in/a.csv", "--num_workers", "3"]);
    });
  });
});
