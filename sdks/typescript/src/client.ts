import { createHash } from "node:crypto";
import { open } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  ApiError,
  type ApiErrorOptions,
  AuthenticationError,
  InvalidBodyError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
} from "./errors";
import { type Logger, silentLogger } from "./logger";
import { AUTH_ROUTES, UPLOAD_ROUTES } from "./routes";
import { OptionalCatalogRecordSchema } from "./schemas";
import { Assets } from "./resources/assets";
import { Artists } from "./resources/artists";
import { Labels } from "./resources/labels";
import { Miscellaneous } from "./resources/miscellaneous";
import { People } from "./resources/people";
import { Products } from "./resources/products";
import { PublishingHouses } from "./resources/publishingHouses";
import { ReleaseProjects } from "./resources/releaseProjects";
import type {
  CatalogRecord,
  ClientOptions,
  HttpMethod,
  RequestOptions,
  SearchParams,
  UploadSession,
} from "./types";
import pkg from "../package.json";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_UPLOAD_CHUNK_SIZE = 5 * 1024 * 1024;

const ApiUrlSchema = z.string().url();

const LoginResponseSchema = z
  .object({
    user: z
      .object({ id: z.union([z.string(), z.number()]).optional() })
      .passthrough()
      .optional(),
  })
  .passthrough();

const ErrorEntrySchema = z
  .object({
    code: z.union([z.string(), z.number()]).optional(),
    message: z.string().optional(),
    original_error: z.object({ error_info: z.unknown() }).passthrough().optional(),
  })
  .passthrough();

const ErrorBodySchema = z
  .object({
    error: z.union([z.array(ErrorEntrySchema), ErrorEntrySchema]).optional(),
  })
  .passthrough();

const UploadStartSchema = z.object({ id: z.union([z.string(), z.number()]) }).passthrough();

type ErrorEntry = z.infer<typeof ErrorEntrySchema>;

interface Credentials {
  name: string;
  password: string;
}

interface DispatchInit {
  searchParams?: SearchParams;
  payload?: RequestInit["body"];
  headers?: Record<string, string>;
}

function formatContext(value: unknown): string {
  if (value === undefined || value === null) return "No context";
  return typeof value === "string" ? value : JSON.stringify(value);
}

function describeErrorEntry(entry: ErrorEntry): string {
  const code = entry.code ?? "No code";
  const message = entry.message ?? "No message";
  return `Code: ${code}, Message: ${message}, Context: ${formatContext(entry.original_error?.error_info)}`;
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function describeShape(value: unknown): string {
  if (value === undefined) return "an empty body";
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : `a ${typeof value}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sessionCookieFrom(headers: Headers): string | undefined {
  const pairs = headers
    .getSetCookie()
    .map((cookie) => cookie.split(";")[0].trim())
    .filter((pair) => pair.includes("="));
  return pairs.length > 0 ? pairs.join("; ") : undefined;
}

/**
 * Session-aware client for the FUGA Catalog API.
 *
 * Authenticates with `POST /login`, keeps the session cookie FUGA sets, and
 * sends it on every subsequent call. Resource helpers (`products`, `assets`,
 * ...) are thin wrappers over {@link FugaClient.request}.
 */
export class FugaClient {
  readonly logger: Logger;
  readonly products: Products;
  readonly assets: Assets;
  readonly artists: Artists;
  readonly labels: Labels;
  readonly people: People;
  readonly publishingHouses: PublishingHouses;
  readonly releaseProjects: ReleaseProjects;
  readonly miscellaneous: Miscellaneous;

  private readonly apiUrl: string;
  private readonly timeoutMs: number;
  private readonly uploadChunkSize: number;
  private readonly transport: typeof fetch;
  private readonly userAgent: string;
  private readonly credentials?: Credentials;
  private authCookie?: string;
  private currentUser?: CatalogRecord;
  private currentUserId?: string;

  constructor(options: ClientOptions) {
    if (!ApiUrlSchema.safeParse(options.apiUrl).success) {
      throw new TypeError(`apiUrl must be an absolute URL, got "${options.apiUrl}"`);
    }
    this.apiUrl = options.apiUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.uploadChunkSize = options.uploadChunkSize ?? DEFAULT_UPLOAD_CHUNK_SIZE;
    this.transport = options.transport ?? globalThis.fetch.bind(globalThis);
    this.logger = options.logger ?? silentLogger;
    this.userAgent = [`FugaCatalogTS/${pkg.version}`, options.userAgentSuffix].filter(Boolean).join(" ");

    if (options.authCookie) {
      this.authCookie = options.authCookie;
    }
    if (options.username && options.password) {
      this.credentials = { name: options.username, password: options.password };
    }
    if (!this.authCookie && !this.credentials) {
      throw new TypeError("Either authCookie or username/password must be provided");
    }

    this.products = new Products(this);
    this.assets = new Assets(this);
    this.artists = new Artists(this);
    this.labels = new Labels(this);
    this.people = new People(this);
    this.publishingHouses = new PublishingHouses(this);
    this.releaseProjects = new ReleaseProjects(this);
    this.miscellaneous = new Miscellaneous(this);
  }

  /** Builds a client and logs in when credentials are given. */
  static async connect(options: ClientOptions): Promise<FugaClient> {
    const client = new FugaClient(options);
    if (options.username && options.password) {
      await client.login();
    }
    return client;
  }

  get sessionToken(): string | undefined {
    return this.authCookie;
  }

  get user(): CatalogRecord | undefined {
    return this.currentUser;
  }

  get userId(): string | undefined {
    return this.currentUserId;
  }

  async login(): Promise<void> {
    if (!this.credentials) {
      throw new AuthenticationError("Login requires a username and password");
    }

    const url = this.buildUrl(AUTH_ROUTES.login);
    let exchanged: { response: Response; text: string };
    try {
      exchanged = await this.exchange(
        "POST",
        url,
        {
          method: "POST",
          headers: {
            accept: "application/json",
            "Content-Type": "application/json",
            "User-Agent": this.userAgent,
          },
          body: JSON.stringify(this.credentials),
        },
        async (response) => ({ response, text: await this.readText("POST", url, response) }),
      );
    } catch (error) {
      throw new AuthenticationError(`Login failed: could not reach ${url.toString()}`, { cause: error });
    }
    const { response, text } = exchanged;

    if (response.status !== 200) {
      throw new AuthenticationError(`Login failed: ${response.status} ${text}`, { httpStatus: response.status });
    }

    const decoded = parseJson(text.trim() === "" ? "{}" : text);
    const body = decoded.ok ? LoginResponseSchema.safeParse(decoded.value) : undefined;
    if (!body?.success) {
      throw new AuthenticationError("Login failed: unexpected response body", { httpStatus: response.status });
    }

    const cookie = sessionCookieFrom(response.headers);
    if (!cookie) {
      throw new AuthenticationError("Login failed: no session cookie in response", { httpStatus: response.status });
    }

    this.authCookie = cookie;
    this.currentUser = body.data.user;
    this.currentUserId = body.data.user?.id !== undefined ? String(body.data.user.id) : undefined;
    this.logger.info("Logged in to FUGA", { userId: this.currentUserId });
  }

  /** Sends a JSON request and decodes the JSON answer. Resolves `undefined` for an empty body. */
  async request(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    return (await this.exchangeJson(method, path, options)).value;
  }

  /**
   * Like {@link FugaClient.request}, but checks the decoded body against
   * `schema`. A body of the wrong shape is an `INVALID_RESPONSE` {@link ApiError}.
   */
  async requestAs<T>(
    method: HttpMethod,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const { status, value } = await this.exchangeJson(method, path, options);
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      this.logger.error(`Unexpected response shape from ${path}`, { status, body: value });
      throw new ApiError({
        code: "INVALID_RESPONSE",
        httpStatus: status,
        message: `Unexpected response from ${method} ${path}: got ${describeShape(value)}`,
        details: { body: value },
      });
    }
    return parsed.data;
  }

  /** Sends a request and returns the body as text. FUGA answers deletions in plain text. */
  async requestText(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<string> {
    const text = await this.dispatch(method, path, this.jsonInit(options), (response, url) =>
      this.readText(method, url, response),
    );
    this.logger.info(`${method} request to ${path} successful.`);
    return text;
  }

  async requestBytes(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<Uint8Array> {
    return this.dispatch(method, path, this.jsonInit(options), async (response, url) => {
      try {
        return new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        throw new TransportError(method, url.toString(), error);
      }
    });
  }

  /**
   * Uploads a local file through FUGA's chunked upload endpoints and returns the
   * finish response. The session describes the entity the file attaches to.
   */
  async uploadFile(filePath: string, session: UploadSession): Promise<CatalogRecord> {
    const started = UploadStartSchema.safeParse(
      await this.request("POST", UPLOAD_ROUTES.start, { body: { ...session } }),
    );
    if (!started.success) {
      throw new ApiError({
        code: "INVALID_RESPONSE",
        httpStatus: 200,
        message: "Upload session response did not include an id",
      });
    }

    const uploadId = String(started.data.id);
    const fileName = path.basename(filePath);
    const absolutePath = path.resolve(filePath);
    const md5 = createHash("md5");
    const handle = await open(absolutePath, "r");

    try {
      const { size } = await handle.stat();
      const totalParts = Math.ceil(size / this.uploadChunkSize);
      this.logger.info(`Uploading file: ${absolutePath}, size: ${size} bytes`);

      for (let partIndex = 0; partIndex < totalParts; partIndex += 1) {
        const offset = partIndex * this.uploadChunkSize;
        const buffer = Buffer.alloc(Math.min(this.uploadChunkSize, size - offset));
        const { bytesRead } = await handle.read(buffer, 0, buffer.length, offset);
        const chunk = buffer.subarray(0, bytesRead);
        md5.update(chunk);

        const form = new FormData();
        form.append("uuid", uploadId);
        form.append("filename", fileName);
        form.append("totalfilesize", String(size));
        form.append("partindex", String(partIndex));
        form.append("partbyteoffset", String(offset));
        form.append("totalparts", String(totalParts));
        form.append("file", new Blob([new Uint8Array(chunk)], { type: "application/octet-stream" }), "blob");

        await this.dispatch(
          "POST",
          UPLOAD_ROUTES.chunk,
          {
            payload: form,
            headers: { "Content-Range": `bytes ${offset}-${offset + chunk.length - 1}/${size}` },
          },
          (response, url) => this.readText("POST", url, response),
        );
        this.logger.info(`Uploaded chunk ${partIndex + 1}/${totalParts}`);
      }
    } finally {
      await handle.close();
    }

    const finished = await this.requestAs("POST", UPLOAD_ROUTES.finish, OptionalCatalogRecordSchema, {
      body: { uuid: uploadId, filename: fileName, md5sum: md5.digest("hex") },
    });
    return finished ?? {};
  }

  private async exchangeJson(
    method: HttpMethod,
    path: string,
    options: RequestOptions,
  ): Promise<{ status: number; value: unknown }> {
    const { status, text } = await this.dispatch(method, path, this.jsonInit(options), async (response, url) => ({
      status: response.status,
      text: await this.readText(method, url, response),
    }));

    if (text.trim() === "") {
      this.logger.info(`Empty response for ${method} request to ${path}.`);
      return { status, value: undefined };
    }

    const decoded = parseJson(text);
    if (!decoded.ok) {
      this.logger.error(`Non-JSON response received from ${path}`, { body: text });
      throw new ApiError({
        code: "INVALID_RESPONSE",
        httpStatus: status,
        message: `Unexpected response format: ${text}`,
        details: { body: text },
      });
    }

    this.logger.debug(`Response JSON from ${path}`, { status });
    return { status, value: decoded.value };
  }

  private jsonInit(options: RequestOptions): DispatchInit {
    if (options.body === undefined) {
      return { searchParams: options.searchParams };
    }
    return {
      searchParams: options.searchParams,
      payload: JSON.stringify(options.body),
      headers: { "Content-Type": "application/json" },
    };
  }

  private buildUrl(path: string, searchParams?: SearchParams): URL {
    const url = new URL(`${this.apiUrl}${path}`);
    if (searchParams) {
      for (const [key, value] of Object.entries(searchParams)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async dispatch<R>(
    method: HttpMethod,
    path: string,
    init: DispatchInit,
    read: (response: Response, url: URL) => Promise<R>,
  ): Promise<R> {
    if (!this.authCookie) {
      throw new AuthenticationError(`Not logged in: call login() before ${method} ${path}`);
    }

    const url = this.buildUrl(path, init.searchParams);
    const headers = new Headers({
      accept: "application/json",
      "User-Agent": this.userAgent,
      ...init.headers,
    });
    headers.set("Cookie", this.authCookie);

    this.logger.debug(`${method} ${path}`);
    return this.exchange(method, url, { method, headers, body: init.payload }, async (response) => {
      if (!response.ok) {
        throw await this.toError(method, url, response);
      }
      return read(response, url);
    });
  }

  /** Sends one call and reads its body before the timeout is cleared. */
  private async exchange<R>(
    method: string,
    url: URL,
    init: RequestInit,
    read: (response: Response) => Promise<R>,
  ): Promise<R> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      let response: Response;
      try {
        response = await this.transport(url, { ...init, signal: controller.signal });
      } catch (error) {
        this.logger.error(`Request failed: ${method} ${url.toString()}`);
        throw new TransportError(method, url.toString(), error);
      }
      return await read(response);
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readText(method: string, url: URL, response: Response): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw new TransportError(method, url.toString(), error);
    }
  }

  private async toError(method: string, url: URL, response: Response): Promise<ApiError> {
    const payload = await this.readText(method, url, response);
    const decoded = parseJson(payload);

    let options: ApiErrorOptions;
    if (decoded.ok) {
      this.logger.error("Error response received", { status: response.status, body: decoded.value });
      const parsed = ErrorBodySchema.safeParse(decoded.value);
      const entries = parsed.success && parsed.data.error !== undefined
        ? Array.isArray(parsed.data.error) ? parsed.data.error : [parsed.data.error]
        : [];
      const summary = entries.length > 0 ? entries.map(describeErrorEntry).join("\n") : "Unknown error occurred.";
      const firstCode = entries.find((entry) => entry.code !== undefined)?.code;
      options = {
        code: firstCode !== undefined ? String(firstCode) : `HTTP_${response.status}`,
        httpStatus: response.status,
        message: `HTTP ${response.status} Error:\n${summary}`,
        details: isRecord(decoded.value) ? decoded.value : { body: decoded.value },
      };
    } else {
      options = {
        code: `HTTP_${response.status}`,
        httpStatus: response.status,
        message: `HTTP ${response.status} Error: ${payload}`,
        details: { body: payload },
      };
      this.logger.error(`Error decoding JSON response: ${options.message}`);
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get("Retry-After"));
      return new RateLimitedError({
        ...options,
        retryAfterMs: response.headers.has("Retry-After") && Number.isFinite(retryAfter) ? retryAfter * 1000 : undefined,
      });
    }
    if (response.status === 400) {
      return new InvalidBodyError(options);
    }
    if (response.status === 401 || response.status === 403) {
      return new UnauthorizedError(options);
    }
    if (response.status === 404) {
      return new NotFoundError(options);
    }
    return new ApiError(options);
  }
}
