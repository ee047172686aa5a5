import { z } from "zod";
import { ReportingError, errorMessage, type ReportingErrorKind } from "../errors.js";
import { ok, err, type Result } from "../utils/result.js";

export const testRunSchema = z.object({
  id: z.number().int(),
  suite_id: z.number().int().nullable().optional(),
  name: z.string(),
  is_completed: z.boolean().optional(),
  url: z.string().optional(),
});

export const testResultSchema = z.object({
  id: z.number().int(),
  status_id: z.number().int().nullable().optional(),
});

export const sectionSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  parent_id: z.number().int().nullable().optional(),
  depth: z.number().int().optional(),
  suite_id: z.number().int().nullable().optional(),
});

/** Older servers answer with a bare array, newer ones paginate. */
const sectionsPageSchema = z.union([
  z.array(sectionSchema),
  z.object({
    sections: z.array(sectionSchema),
    _links: z.object({ next: z.string().nullable().optional() }).optional(),
  }),
]);

type SectionsPage = z.infer<typeof sectionsPageSchema>;
export type TestRun = z.infer<typeof testRunSchema>;
export type TestResult = z.infer<typeof testResultSchema>;
export type Section = z.infer<typeof sectionSchema>;

export interface AddRunPayload {
  suite_id: number;
  name: string;
  description: string;
  include_all: boolean;
  case_ids?: number[];
}

export interface AddResultPayload {
  status_id: number;
  comment?: string;
  /** Timespan such as `"42s"`. */
  elapsed?: string;
}

export interface TestRailClientOptions {
  url: string;
  username: string;
  password: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
}

type Method = "GET" | "POST";

/**
 * Thin client for the TestRail v2 API. Every call is a single request with
 * no retry and resolves to a Result; nothing here throws.
 */
export class TestRailClient {
  private readonly base: string;
  private readonly authorization: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TestRailClientOptions) {
    this.base = `${options.url.replace(/\/+$/, "")}/index.php?/api/v2/`;
    this.authorization =
      "Basic " + Buffer.from(`${options.username}:${options.password}`).toString("base64");
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  addRun(projectId: number, payload: AddRunPayload): Promise<Result<TestRun, ReportingError>> {
    return this.send("POST", `add_run/${projectId}`, testRunSchema, payload);
  }

  closeRun(runId: number): Promise<Result<TestRun, ReportingError>> {
    return this.send("POST", `close_run/${runId}`, testRunSchema, {});
  }

  addResultForCase(
    runId: number,
    caseId: number,
    payload: AddResultPayload
  ): Promise<Result<TestResult, ReportingError>> {
    return this.send("POST", `add_result_for_case/${runId}/${caseId}`, testResultSchema, payload);
  }

  async deleteCase(caseId: number): Promise<Result<void, ReportingError>> {
    const result = await this.send("POST", `delete_case/${caseId}`, z.unknown(), {});
    return result.ok ? ok(undefined) : result;
  }

  /** All sections of a suite, following pagination links. */
  async getSections(projectId: number, suiteId: number): Promise<Result<Section[], ReportingError>> {
    const sections: Section[] = [];
    let uri: string | undefined = `get_sections/${projectId}&suite_id=${suiteId}`;
    while (uri) {
      const page: Result<SectionsPage, ReportingError> = await this.send("GET", uri, sectionsPageSchema);
      if (!page.ok) return page;
      if (Array.isArray(page.value)) {
        sections.push(...page.value);
        break;
      }
      sections.push(...page.value.sections);
      uri = page.value._links?.next?.replace(/^\/?api\/v2\//, "") || undefined;
    }
    return ok(sections);
  }

  private async send<S extends z.ZodTypeAny>(
    method: Method,
    uri: string,
    schema: S,
    body?: unknown
  ): Promise<Result<z.infer<S>, ReportingError>> {
    const url = this.base + uri;
    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { Authorization: this.authorization, "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
      // The timeout signal also covers the body, which can fail after the headers arrived.
      text = await response.text();
    } catch (error) {
      return err(
        new ReportingError("network", `${method} ${uri} failed: ${errorMessage(error)}`, undefined, {
          cause: error,
        })
      );
    }
    if (!response.ok) {
      const kind = kindForStatus(response.status);
      return err(
        new ReportingError(
          kind,
          `${method} ${uri} returned ${response.status}${describeServerError(text)}`,
          response.status
        )
      );
    }

    let json: unknown;
    try {
      json = text ? JSON.parse(text) : undefined;
    } catch (error) {
      return err(
        new ReportingError("protocol", `${method} ${uri} returned malformed JSON`, response.status, {
          cause: error,
        })
      );
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      return err(
        new ReportingError(
          "protocol",
          `${method} ${uri} returned an unexpected body: ${parsed.error.issues
            .map((i) => `${i.path.join(".") || "(root)"} ${i.message}`)
            .join("; ")}`,
          response.status
        )
      );
    }
    return ok(parsed.data);
  }
}

function kindForStatus(status: number): ReportingErrorKind {
  if (status === 401 || status === 403) return "auth";
  if (status === 404) return "not-found";
  if (status === 400) return "validation";
  return "http";
}

const serverErrorSchema = z.object({ error: z.string() });

function describeServerError(text: string): string {
  try {
    const parsed = serverErrorSchema.safeParse(JSON.parse(text));
    return parsed.success ? `: ${parsed.data.error}` : "";
  } catch {
    return "";
  }
}
