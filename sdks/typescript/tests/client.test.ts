import { ReadableStream } from "node:stream/web";
import { describe, expect, it, vi } from "vitest";
import {
  ApiError,
  AuthenticationError,
  FugaClient,
  InvalidBodyError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
  isNotFound,
  type Logger,
} from "../src";
import {
  FAKE_API_URL,
  FAKE_PASSWORD,
  FAKE_SESSION_COOKIE,
  FAKE_USERNAME,
  createFakeFuga,
  createStaticTransport,
} from "./support/fakeFuga";

const jsonResponse = (status: number, payload: unknown, headers: Record<string, string> = {}) =>
  new Response(JSON.stringify(payload), { status, headers: { "Content-Type": "application/json", ...headers } });

// Sends the first byte of a body, then stalls until the request is aborted.
function stalledBodyTransport(): typeof fetch {
  return async (_input, init) => {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(new TextEncoder().encode("{"));
        init?.signal?.addEventListener("abort", () => controller.error(new Error("aborted")));
      },
    });
    return new Response(body, { status: 200 });
  };
}

function sessionClient(respond: Parameters<typeof createStaticTransport>[0], logger?: Logger) {
  const { transport, calls } = createStaticTransport(respond);
  const client = new FugaClient({ apiUrl: FAKE_API_URL, authCookie: FAKE_SESSION_COOKIE, transport, logger });
  return { client, calls };
}

describe("FugaClient login", () => {
  it("stores the session cookie and user after a successful login", async () => {
    const fake = createFakeFuga();
    const client = new FugaClient({
      apiUrl: FAKE_API_URL,
      username: FAKE_USERNAME,
      password: FAKE_PASSWORD,
      transport: fake.transport,
    });

    await client.login();

    expect(client.sessionToken).toBe(FAKE_SESSION_COOKIE);
    expect(client.userId).toBe("42");
    expect(client.user).toEqual({ id: 42, name: FAKE_USERNAME });
    expect(fake.calls[0].url.toString()).toBe("https://fuga.test/api/v2/login");
    expect(JSON.parse(fake.calls[0].body ?? "")).toEqual({ name: FAKE_USERNAME, password: FAKE_PASSWORD });
  });

  it("rejects bad credentials with an AuthenticationError", async () => {
    const fake = createFakeFuga();
    const client = new FugaClient({
      apiUrl: FAKE_API_URL,
      username: FAKE_USERNAME,
      password: "wrong-secret",
      transport: fake.transport,
    });

    const failure = client.login();
    await expect(failure).rejects.toBeInstanceOf(AuthenticationError);
    await expect(failure).rejects.toMatchObject({ httpStatus: 401 });
    expect(client.sessionToken).toBeUndefined();
  });

  it("reports an unreachable endpoint as an AuthenticationError caused by a TransportError", async () => {
    const transport: typeof fetch = async () => {
      throw new TypeError("fetch failed");
    };
    const client = new FugaClient({ apiUrl: FAKE_API_URL, username: FAKE_USERNAME, password: FAKE_PASSWORD, transport });

    const error = await client.login().catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error instanceof AuthenticationError && error.cause).toBeInstanceOf(TransportError);
  });

  it("fails when FUGA answers 200 without a session cookie", async () => {
    const { transport } = createStaticTransport(() => jsonResponse(200, { user: { id: 7 } }));
    const client = new FugaClient({ apiUrl: FAKE_API_URL, username: FAKE_USERNAME, password: FAKE_PASSWORD, transport });

    await expect(client.login()).rejects.toThrow("Login failed: no session cookie in response");
  });

  it("logs in while connecting when credentials are given", async () => {
    const fake = createFakeFuga();
    const client = await FugaClient.connect({
      apiUrl: FAKE_API_URL,
      username: FAKE_USERNAME,
      password: FAKE_PASSWORD,
      transport: fake.transport,
    });

    expect(client.sessionToken).toBe(FAKE_SESSION_COOKIE);
  });

  it("requires credentials or a session cookie", () => {
    expect(() => new FugaClient({ apiUrl: FAKE_API_URL })).toThrow(TypeError);
  });

  it("rejects an apiUrl that is not absolute", () => {
    expect(() => new FugaClient({ apiUrl: "fuga.test", authCookie: FAKE_SESSION_COOKIE })).toThrow(
      'apiUrl must be an absolute URL, got "fuga.test"',
    );
  });

  it("times out a login whose body never finishes", async () => {
    const client = new FugaClient({
      apiUrl: FAKE_API_URL,
      username: FAKE_USERNAME,
      password: FAKE_PASSWORD,
      transport: stalledBodyTransport(),
      timeoutMs: 20,
    });

    const error = await client.login().catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error instanceof AuthenticationError && error.cause).toBeInstanceOf(TransportError);
  });

  it("refuses to log in with only a session cookie", async () => {
    const client = new FugaClient({ apiUrl: FAKE_API_URL, authCookie: FAKE_SESSION_COOKIE });
    await expect(client.login()).rejects.toThrow("Login requires a username and password");
  });
});

describe("FugaClient.request", () => {
  it("refuses to call FUGA before login", async () => {
    const mockFetch: typeof fetch = vi.fn(async () => jsonResponse(200, {}));
    const client = new FugaClient({
      apiUrl: FAKE_API_URL,
      username: FAKE_USERNAME,
      password: FAKE_PASSWORD,
      transport: mockFetch,
    });

    await expect(client.request("GET", "/products")).rejects.toBeInstanceOf(AuthenticationError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("sends the session cookie, user agent and query string", async () => {
    const { transport, calls } = createStaticTransport(() => jsonResponse(200, { product: [], total: 0 }));
    const client = new FugaClient({
      apiUrl: `${FAKE_API_URL}/`,
      authCookie: FAKE_SESSION_COOKIE,
      userAgentSuffix: "catalog-sync",
      transport,
    });

    await client.request("GET", "/products", { searchParams: { page: 2, page_size: 5, search: undefined } });

    expect(calls).toHaveLength(1);
    expect(calls[0].url.toString()).toBe("https://fuga.test/api/v2/products?page=2&page_size=5");
    expect(calls[0].headers.get("Cookie")).toBe(FAKE_SESSION_COOKIE);
    expect(calls[0].headers.get("User-Agent")).toBe("FugaCatalogTS/0.5.10 catalog-sync");
    expect(calls[0].body).toBeUndefined();
  });

  it("encodes bodies as JSON", async () => {
    const { client, calls } = sessionClient(() => jsonResponse(200, { id: 1 }));

    const result = await client.request("POST", "/labels", { body: { name: "Test Label" } });

    expect(result).toEqual({ id: 1 });
    expect(calls[0].method).toBe("POST");
    expect(calls[0].headers.get("Content-Type")).toBe("application/json");
    expect(calls[0].body).toBe('{"name":"Test Label"}');
  });

  it("resolves undefined for an empty success body", async () => {
    const { client } = sessionClient(() => new Response(null, { status: 204 }));
    await expect(client.request("POST", "/products/1/publish")).resolves.toBeUndefined();
  });

  it("surfaces a non-JSON success body as an ApiError", async () => {
    const { client } = sessionClient(() => new Response("<html>maintenance</html>", { status: 200 }));

    const error = await client.request("GET", "/products/1").catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      code: "INVALID_RESPONSE",
      httpStatus: 200,
      message: "Unexpected response format: <html>maintenance</html>",
    });
  });

  it("formats a single FUGA error object", async () => {
    const { client } = sessionClient(() =>
      jsonResponse(422, {
        error: { code: "VALIDATION", message: "name is required", original_error: { error_info: "name" } },
      }),
    );

    const error = await client.request("POST", "/products", { body: {} }).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({
      name: "ApiError",
      code: "VALIDATION",
      httpStatus: 422,
      message: "HTTP 422 Error:\nCode: VALIDATION, Message: name is required, Context: name",
    });
  });

  it("formats a list of FUGA errors one per line", async () => {
    const { client } = sessionClient(() =>
      jsonResponse(400, { error: [{ code: "A1", message: "first" }, {}] }),
    );

    const error = await client.request("PUT", "/products/1", { body: {} }).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(InvalidBodyError);
    expect(error).toMatchObject({
      code: "A1",
      message:
        "HTTP 400 Error:\nCode: A1, Message: first, Context: No context\nCode: No code, Message: No message, Context: No context",
    });
  });

  it("falls back to a generic message when the error body has no error entry", async () => {
    const { client } = sessionClient(() => jsonResponse(500, { detail: "boom" }));

    await expect(client.request("GET", "/products")).rejects.toMatchObject({
      code: "HTTP_500",
      httpStatus: 500,
      message: "HTTP 500 Error:\nUnknown error occurred.",
      details: { detail: "boom" },
    });
  });

  it("keeps the raw text of a non-JSON error body", async () => {
    const { client } = sessionClient(() => new Response("Bad Gateway", { status: 502 }));

    await expect(client.request("GET", "/products")).rejects.toMatchObject({
      code: "HTTP_502",
      message: "HTTP 502 Error: Bad Gateway",
    });
  });

  it("maps statuses onto error subclasses", async () => {
    const statuses: Record<string, number> = { "/missing": 404, "/forbidden": 403, "/busy": 429 };
    const { client } = sessionClient((call) => {
      const status = statuses[call.url.pathname.replace("/api/v2", "")] ?? 500;
      return jsonResponse(status, { error: { code: `E${status}` } }, status === 429 ? { "Retry-After": "3" } : {});
    });

    const missing = await client.request("GET", "/missing").catch((reason: unknown) => reason);
    expect(missing).toBeInstanceOf(NotFoundError);
    expect(isNotFound(missing)).toBe(true);

    await expect(client.request("GET", "/forbidden")).rejects.toBeInstanceOf(UnauthorizedError);

    const busy = await client.request("GET", "/busy").catch((reason: unknown) => reason);
    expect(busy).toBeInstanceOf(RateLimitedError);
    expect(busy).toMatchObject({ retryAfterMs: 3000, code: "E429" });
  });

  it("wraps network failures in a TransportError", async () => {
    const transport: typeof fetch = async () => {
      throw new Error("socket hang up");
    };
    const client = new FugaClient({ apiUrl: FAKE_API_URL, authCookie: FAKE_SESSION_COOKIE, transport });

    const error = await client.request("GET", "/products").catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({
      method: "GET",
      message: "Request failed: GET https://fuga.test/api/v2/products: socket hang up",
    });
  });

  it("aborts requests that exceed the timeout", async () => {
    const transport: typeof fetch = (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
      });
    const client = new FugaClient({ apiUrl: FAKE_API_URL, authCookie: FAKE_SESSION_COOKIE, transport, timeoutMs: 5 });

    await expect(client.request("GET", "/products")).rejects.toBeInstanceOf(TransportError);
  });

  it("keeps the timeout running while the body is read", async () => {
    const client = new FugaClient({
      apiUrl: FAKE_API_URL,
      authCookie: FAKE_SESSION_COOKIE,
      transport: stalledBodyTransport(),
      timeoutMs: 20,
    });

    await expect(client.request("GET", "/products/1")).rejects.toBeInstanceOf(TransportError);
    await expect(client.requestText("DELETE", "/products/1")).rejects.toBeInstanceOf(TransportError);
    await expect(client.requestBytes("GET", "/assets/1/audio")).rejects.toBeInstanceOf(TransportError);
  });

  it("returns plain text and bytes on request", async () => {
    const { client } = sessionClient((call) =>
      call.method === "DELETE"
        ? new Response("Product deleted", { status: 200 })
        : new Response(new Uint8Array([73, 68, 51]), { status: 200, headers: { "Content-Type": "audio/mpeg" } }),
    );

    await expect(client.requestText("DELETE", "/products/1")).resolves.toBe("Product deleted");
    await expect(client.requestBytes("GET", "/assets/1/audio")).resolves.toEqual(new Uint8Array([73, 68, 51]));
  });

  it("logs error payloads through the configured logger", async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { client } = sessionClient(() => jsonResponse(500, { detail: "boom" }), logger);

    await expect(client.request("GET", "/products")).rejects.toBeInstanceOf(ApiError);
    expect(logger.error).toHaveBeenCalledWith("Error response received", { status: 500, body: { detail: "boom" } });
    expect(logger.debug).toHaveBeenCalledWith("GET /products");
  });
});
