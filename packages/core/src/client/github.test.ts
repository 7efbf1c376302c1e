import { afterEach, describe, expect, it, vi } from "vitest";
import { CancellationError } from "../errors";
import type { RegistryEntry } from "../registry/types";
import { checkRepositories, checkRepository } from "./github";

const ACME: RegistryEntry = {
  name: "Acme/Mod",
  custom_name: "Acme Mod",
  url: "https://github.com/Acme/Mod",
};

type FetchInput = string | URL | Request;

function jsonResponse(body: unknown, init: ResponseInit = {}) {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init,
  });
}

function urlOf(input: FetchInput): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/** Headers arrive, the body never does */
function stalledResponse() {
  return new Response(new ReadableStream({ start() {} }), {
    status: 200,
    headers: { "content-type": "application/json" },
  });
}

/** Routes requests by URL; anything unrouted fails the test */
function stubFetch(routes: Record<string, () => Response>) {
  const fetchMock = vi.fn(async (input: FetchInput, _init?: RequestInit) => {
    const route = routes[urlOf(input)];
    if (!route) throw new Error(`Unmocked fetch: GET ${urlOf(input)}`);
    return route();
  });
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

describe("checkRepository", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("reports a live repository with its description and latest release", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () =>
        jsonResponse({ full_name: "Acme/Mod", description: "Saber pack" }),
      "https://api.github.com/repos/Acme/Mod/releases/latest": () =>
        jsonResponse({ tag_name: "v1.2.0" }),
    });

    const result = await checkRepository(ACME);

    expect(result).toEqual({
      name: "Acme/Mod",
      url: "https://github.com/Acme/Mod",
      status: "ok",
      platformDescription: "Saber pack",
      latestRelease: "v1.2.0",
    });
  });

  it("reports no release when none is published", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () =>
        jsonResponse({ description: null }),
      "https://api.github.com/repos/Acme/Mod/releases/latest": () =>
        new Response(null, { status: 404 }),
    });

    const result = await checkRepository(ACME);

    expect(result.status).toBe("ok");
    expect(result.platformDescription).toBeNull();
    expect(result.latestRelease).toBeNull();
  });

  it("reports a missing repository", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () =>
        new Response(null, { status: 404 }),
    });

    const result = await checkRepository(ACME);

    expect(result.status).toBe("missing");
    expect(result.message).toBe("Repository not found");
  });

  it("detects the rate limit", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () =>
        new Response(null, {
          status: 403,
          headers: { "x-ratelimit-remaining": "0" },
        }),
    });

    const result = await checkRepository(ACME);

    expect(result.status).toBe("rate-limited");
  });

  it("reports other server errors", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () =>
        new Response(null, { status: 500, statusText: "Internal Server Error" }),
    });

    const result = await checkRepository(ACME);

    expect(result.status).toBe("error");
    expect(result.message).toBe("GitHub returned 500 Internal Server Error");
  });

  it("sends the token and uses a custom API base", async () => {
    const fetchMock = stubFetch({
      "https://ghe.example.test/api/v3/repos/Acme/Mod": () =>
        jsonResponse({ description: "x" }),
      "https://ghe.example.test/api/v3/repos/Acme/Mod/releases/latest": () =>
        new Response(null, { status: 404 }),
    });

    await checkRepository(ACME, {
      apiBaseUrl: "https://ghe.example.test/api/v3/",
      token: "test-token",
    });

    const init = fetchMock.mock.calls[0]?.[1];
    expect(new Headers(init?.headers).get("authorization")).toBe(
      "Bearer test-token"
    );
  });

  it("turns a slow request into a timeout error", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_input: FetchInput, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () =>
              reject(new DOMException("aborted", "AbortError"))
            );
          })
      )
    );

    const result = await checkRepository(ACME, { timeoutMs: 10 });

    expect(result.status).toBe("error");
    expect(result.message).toBe("Request timed out after 10ms");
  });

  it("times out while the body is still streaming", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": stalledResponse,
    });

    const result = await checkRepository(ACME, { timeoutMs: 20 });

    expect(result.status).toBe("error");
    expect(result.message).toBe("Request timed out after 20ms");
  });

  it("times out on a stalled release body", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () => jsonResponse({}),
      "https://api.github.com/repos/Acme/Mod/releases/latest": stalledResponse,
    });

    const result = await checkRepository(ACME, { timeoutMs: 20 });

    expect(result.status).toBe("error");
    expect(result.message).toBe("Request timed out after 20ms");
  });

  it("rejects when cancelled while the body is streaming", async () => {
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": stalledResponse,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      checkRepository(ACME, { signal: controller.signal, timeoutMs: 5_000 })
    ).rejects.toBeInstanceOf(CancellationError);
  });

  it("rejects when cancelled while the request is pending", async () => {
    const fetchMock = vi.fn(
      (_input: FetchInput, _init?: RequestInit) =>
        new Promise<Response>(() => {})
    );
    vi.stubGlobal("fetch", fetchMock);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    await expect(
      checkRepository(ACME, { signal: controller.signal, timeoutMs: 5_000 })
    ).rejects.toBeInstanceOf(CancellationError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("rejects when cancelled", async () => {
    const fetchMock = stubFetch({});
    const controller = new AbortController();
    controller.abort();

    await expect(
      checkRepository(ACME, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancellationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe("checkRepositories", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("keeps registry order and reports progress", async () => {
    const entries: RegistryEntry[] = ["Acme/Mod", "Beta/Pack", "Gamma/Maps"].map(
      (name) => ({
        name,
        custom_name: name,
        url: `https://github.com/${name}`,
      })
    );
    stubFetch({
      "https://api.github.com/repos/Acme/Mod": () => jsonResponse({}),
      "https://api.github.com/repos/Acme/Mod/releases/latest": () =>
        jsonResponse({ tag_name: "v1" }),
      "https://api.github.com/repos/Beta/Pack": () =>
        new Response(null, { status: 404 }),
      "https://api.github.com/repos/Gamma/Maps": () => jsonResponse({}),
      "https://api.github.com/repos/Gamma/Maps/releases/latest": () =>
        new Response(null, { status: 404 }),
    });
    const onResult = vi.fn();

    const results = await checkRepositories(entries, {
      concurrency: 2,
      onResult,
    });

    expect(results.map((r) => [r.name, r.status])).toEqual([
      ["Acme/Mod", "ok"],
      ["Beta/Pack", "missing"],
      ["Gamma/Maps", "ok"],
    ]);
    expect(onResult).toHaveBeenCalledTimes(3);
    expect(onResult.mock.calls.map((call) => call[1])).toEqual([1, 2, 3]);
  });

  it("stops requesting once cancelled mid-run", async () => {
    const entries: RegistryEntry[] = ["Acme/Mod", "Beta/Pack", "Gamma/Maps"].map(
      (name) => ({
        name,
        custom_name: name,
        url: `https://github.com/${name}`,
      })
    );
    const controller = new AbortController();
    const fetchMock = stubFetch({
      "https://api.github.com/repos/Acme/Mod": () => jsonResponse({}),
      "https://api.github.com/repos/Acme/Mod/releases/latest": () =>
        jsonResponse({ tag_name: "v1" }),
      "https://api.github.com/repos/Beta/Pack": () => {
        setTimeout(() => controller.abort(), 10);
        return stalledResponse();
      },
    });
    const onResult = vi.fn();

    await expect(
      checkRepositories(entries, {
        concurrency: 1,
        timeoutMs: 5_000,
        signal: controller.signal,
        onResult,
      })
    ).rejects.toBeInstanceOf(CancellationError);

    expect(fetchMock.mock.calls.map((call) => urlOf(call[0]))).toEqual([
      "https://api.github.com/repos/Acme/Mod",
      "https://api.github.com/repos/Acme/Mod/releases/latest",
      "https://api.github.com/repos/Beta/Pack",
    ]);
    expect(onResult).toHaveBeenCalledTimes(1);
  });

  it("returns nothing for an empty registry", async () => {
    expect(await checkRepositories([])).toEqual([]);
  });
});
