/** Thin ClickUp v2 REST client: access verification and task creation. */

import { DEFAULT_BASE_URL } from "./config.js";
import { APIError, AuthenticationError, ResourceNotFoundError } from "./errors.js";
import { silentLogger, type Logger } from "./logger.js";
import type { CreateTaskResult, TaskPayload } from "./types.js";

const REQUEST_TIMEOUT_MS = 30_000;

export const DRY_RUN_TASK_ID = "dry-run-task-id";
export const DRY_RUN_TASK_URL = "https://app.clickup.com/dry-run-url";

export interface ClickUpClientOptions {
  token: string;
  listId: string;
  baseUrl?: string;
  dryRun?: boolean;
  logger?: Logger;
}

function stringField(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !Object.hasOwn(body, key)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

export class ClickUpClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(private readonly options: ClickUpClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    // Personal API tokens go in the Authorization header without a scheme.
    this.headers = {
      Authorization: options.token,
      "Content-Type": "application/json",
    };
    this.logger = options.logger ?? silentLogger;
  }

  get dryRun(): boolean {
    return this.options.dryRun ?? false;
  }

  private async request(method: string, path: string, body?: unknown): Promise<Response> {
    this.logger.debug(`${method} ${this.baseUrl}${path}`);
    return fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers,
      body: body === undefined ? undefined : JSON.stringify(body),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });
  }

  /** GET a resource during verification, mapping failures onto the error taxonomy. */
  private async verifyGet(path: string, notFoundMessage: string): Promise<Response> {
    let resp: Response;
    try {
      resp = await this.request("GET", path);
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new APIError(`Error connecting to ClickUp API: ${msg}`, undefined, e);
    }

    if (resp.status === 401) {
      throw new AuthenticationError("Invalid API token. Please check your API token and try again.");
    }
    if (resp.status === 404) {
      throw new ResourceNotFoundError(notFoundMessage);
    }
    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      throw new APIError(`HTTP ${resp.status} from ${path}: ${text}`, resp.status);
    }
    return resp;
  }

  /**
   * Check the token against the current user and that the target list exists.
   * Returns the list's display name.
   */
  async verifyAccess(): Promise<string> {
    const { listId } = this.options;
    await this.verifyGet("/user", "Authenticated user not found.");
    const resp = await this.verifyGet(
      `/list/${encodeURIComponent(listId)}`,
      `List ID ${listId} not found. Please check your list ID and try again.`,
    );

    let list: unknown;
    try {
      list = await resp.json();
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new APIError(`Invalid response for list ${listId}: ${msg}`, resp.status, e);
    }

    if (typeof list === "object" && list !== null && "name" in list && typeof list.name === "string") {
      return list.name;
    }
    return "Unknown";
  }

  /**
   * Create a task in the configured list. Failures come back as
   * `{ ok: false }` so one bad row cannot stop the batch.
   */
  async createTask(payload: TaskPayload): Promise<CreateTaskResult> {
    if (this.dryRun) {
      this.logger.info(`[dry-run] Would create task: "${payload.name}"`);
      return { ok: true, id: DRY_RUN_TASK_ID, url: DRY_RUN_TASK_URL };
    }

    let resp: Response;
    try {
      resp = await this.request(
        "POST",
        `/list/${encodeURIComponent(this.options.listId)}/task`,
        payload,
      );
    } catch (e: unknown) {
      const msg = e instanceof Error ? e.message : String(e);
      return { ok: false, error: `Error connecting to ClickUp API: ${msg}` };
    }

    if (!resp.ok) {
      const text = await resp.text().catch(() => "");
      return { ok: false, error: `HTTP ${resp.status}: ${text}`.trim() };
    }

    // The task exists once ClickUp answers 2xx, even if the body is unusable.
    let body: unknown;
    try {
      body = await resp.json();
    } catch {
      body = null;
    }
    return {
      ok: true,
      id: stringField(body, "id") ?? "unknown",
      url: stringField(body, "url") ?? "",
    };
  }
}
