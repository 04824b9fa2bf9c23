import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runImport, type ImportOptions, type TaskService } from "./importer.js";
import { AuthenticationError, ConfigurationError, CSVError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CreateTaskResult, TaskPayload } from "./types.js";

// Stub global fetch so nothing can reach the network
const mockFetch = vi.fn();
vi.stubGlobal("fetch", mockFetch);

let dir: string;

beforeEach(() => {
  mockFetch.mockReset();
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "clickup-import-run-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeCsvFixture(content: string): string {
  const file = path.join(dir, "tasks.csv");
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

function options(csvFile: string, overrides: Partial<ImportOptions> = {}): ImportOptions {
  return { csvFile, listId: "L1", token: "test-token", ...overrides };
}

function makeLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

function makeClient(results: CreateTaskResult[] = []) {
  let n = 0;
  return {
    verifyAccess: vi.fn(async () => "Sprint Backlog"),
    createTask: vi.fn(async (_payload: TaskPayload): Promise<CreateTaskResult> => {
      n++;
      return results.shift() ?? { ok: true, id: `id-${n}`, url: `https://app.clickup.com/t/id-${n}` };
    }),
  } satisfies TaskService;
}

const TWO_VALID_ONE_BLANK = "name,description\nTask A,First\n,No name\nTask B,Second\n";

// ─── dry run ─────────────────────────────────────────────────────────────────

describe("runImport in dry-run mode", () => {
  it("creates every named row and silently skips the unnamed one", async () => {
    const file = writeCsvFixture(TWO_VALID_ONE_BLANK);

    const summary = await runImport(options(file, { dryRun: true }));

    expect(summary.successCount).toBe(2);
    expect(summary.errorCount).toBe(0);
    expect(summary.skippedCount).toBe(1);
    expect(summary.totalRows).toBe(3);
    expect(summary.entries.map((e) => e.row)).toEqual([1, 3]);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("does not verify access", async () => {
    const file = writeCsvFixture(TWO_VALID_ONE_BLANK);
    const client = makeClient();

    await runImport(options(file, { dryRun: true }), { client });

    expect(client.verifyAccess).not.toHaveBeenCalled();
  });
});

// ─── pre-flight failures ─────────────────────────────────────────────────────

describe("runImport pre-flight", () => {
  it("aborts before any row when the name column is missing", async () => {
    const file = writeCsvFixture("title,description\nTask A,First\n");
    const client = makeClient();

    await expect(runImport(options(file), { client })).rejects.toThrow(
      new CSVError("CSV must contain a 'name' column for task names"),
    );
    expect(client.verifyAccess).not.toHaveBeenCalled();
    expect(client.createTask).not.toHaveBeenCalled();
  });

  it("fails with CSVError when the file does not exist", async () => {
    await expect(runImport(options(path.join(dir, "missing.csv")))).rejects.toBeInstanceOf(
      CSVError,
    );
  });

  it("requires a token and a list id", async () => {
    const file = writeCsvFixture(TWO_VALID_ONE_BLANK);
    await expect(runImport(options(file, { token: "" }))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
    await expect(runImport(options(file, { listId: "" }))).rejects.toBeInstanceOf(
      ConfigurationError,
    );
  });

  it("creates nothing when verification fails", async () => {
    const file = writeCsvFixture(TWO_VALID_ONE_BLANK);
    const client = makeClient();
    client.verifyAccess.mockRejectedValueOnce(new AuthenticationError("bad token"));

    await expect(runImport(options(file), { client })).rejects.toBeInstanceOf(AuthenticationError);
    expect(client.createTask).not.toHaveBeenCalled();
  });
});

// ─── processing ──────────────────────────────────────────────────────────────

describe("runImport processing", () => {
  it("records a failure for one row and keeps going", async () => {
    const file = writeCsvFixture("name\nTask A\nTask B\nTask C\n");
    const client = makeClient([
      { ok: true, id: "a", url: "https://app.clickup.com/t/a" },
      { ok: false, error: 'HTTP 500: {"err":"boom"}' },
    ]);

    const summary = await runImport(options(file), { client });

    expect(client.verifyAccess).toHaveBeenCalledTimes(1);
    expect(client.createTask).toHaveBeenCalledTimes(3);
    expect(summary.successCount).toBe(2);
    expect(summary.errorCount).toBe(1);
    expect(summary.entries[1]).toEqual({
      kind: "failure",
      name: "Task B",
      row: 2,
      error: 'HTTP 500: {"err":"boom"}',
    });
    expect(summary.entries[2]).toMatchObject({ kind: "success", name: "Task C", row: 3 });
  });

  it("passes mapped payloads to the client in file order", async () => {
    const file = writeCsvFixture("name,priority,tags\nFirst,urgent,a\nSecond,low,\n");
    const client = makeClient();

    await runImport(options(file), { client });

    expect(client.createTask.mock.calls.map(([p]) => p)).toEqual([
      { name: "First", description: "", priority: 1, tags: ["a"] },
      { name: "Second", description: "", priority: 4 },
    ]);
  });

  it("logs a warning for an unparseable due date and still creates the task", async () => {
    const file = writeCsvFixture("name,due_date\nTask A,someday\n");
    const client = makeClient();
    const logger = makeLogger();

    const summary = await runImport(options(file), { client, logger });

    expect(summary.successCount).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Row 1: could not parse due date "someday"');
    expect(client.createTask.mock.calls[0][0]).not.toHaveProperty("due_date");
  });

  it("warns about CSV parse problems before processing", async () => {
    const file = writeCsvFixture('name\n"Task A\nTask B\n');
    const logger = makeLogger();

    await runImport(options(file), { client: makeClient(), logger });

    expect(logger.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^CSV parse problem: .*Quoted field unterminated$/),
    );
  });

  it("uses the real client against the API when no client is injected", async () => {
    const file = writeCsvFixture("name\nTask A\n");
    mockFetch
      .mockResolvedValueOnce(new Response(JSON.stringify({ user: { id: 1 } }), { status: 200 }))
      .mockResolvedValueOnce(new Response(JSON.stringify({ name: "Inbox" }), { status: 200 }))
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ id: "t1", url: "https://app.clickup.com/t/t1" }), {
          status: 200,
        }),
      );

    const summary = await runImport(options(file, { baseUrl: "https://clickup.test/api/v2" }));

    expect(mockFetch.mock.calls.map(([url]) => url)).toEqual([
      "https://clickup.test/api/v2/user",
      "https://clickup.test/api/v2/list/L1",
      "https://clickup.test/api/v2/list/L1/task",
    ]);
    expect(summary.entries).toEqual([
      { kind: "success", name: "Task A", row: 1, taskId: "t1", url: "https://app.clickup.com/t/t1" },
    ]);
  });
});

// ─── finalizing ──────────────────────────────────────────────────────────────

describe("runImport output ledger", () => {
  it("writes one line per processed row", async () => {
    const file = writeCsvFixture("name\nTask A\n\nTask B\n");
    const output = path.join(dir, "results.csv");
    const client = makeClient([
      { ok: true, id: "a", url: "https://app.clickup.com/t/a" },
      { ok: false, error: "HTTP 400: bad" },
    ]);

    await runImport(options(file, { output }), { client });

    expect(fs.readFileSync(output, "utf-8").split("\r\n")).toEqual([
      "task_name,status,task_id,task_url,error",
      "Task A,SUCCESS,a,https://app.clickup.com/t/a,",
      "Task B,FAILED,,,HTTP 400: bad",
    ]);
  });

  it("logs but does not fail when the ledger cannot be written", async () => {
    const file = writeCsvFixture("name\nTask A\n");
    const output = path.join(dir, "no-such-dir", "results.csv");
    const logger = makeLogger();

    const summary = await runImport(options(file, { output }), {
      client: makeClient(),
      logger,
    });

    expect(summary.successCount).toBe(1);
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0][0]).toMatch(/^Failed to write results to /);
  });
});
