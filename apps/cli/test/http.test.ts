import { describe, it, expect, vi, afterEach } from "vitest";
import { Type } from "@sinclair/typebox";
import { ApiError, httpGet, httpPost } from "../src/lib/http.js";

const config = { node: "http://ledger.test", token: "test-token" };

function stubFetch(status: number, body: string) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(body, { status }));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("http helpers", () => {
  it("posts JSON with the bearer token and checks the response", async () => {
    const fetchMock = stubFetch(201, JSON.stringify({ id: 1, net: "990" }));
    const record = await httpPost(config, "/transfers", Type.Object({ id: Type.Integer(), net: Type.String() }), {
      amount: "1000",
    });
    expect(record).toEqual({ id: 1, net: "990" });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("http://ledger.test/transfers");
    expect(init).toMatchObject({
      method: "POST",
      body: '{"amount":"1000"}',
      headers: { "content-type": "application/json", authorization: "Bearer test-token" },
    });
  });

  it("turns node errors into ApiError", async () => {
    stubFetch(409, JSON.stringify({ error: "daily_limit_exceeded", detail: "guest daily limit is 10" }));
    const err = await httpGet(config, "/x", Type.Object({})).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ApiError);
    expect(err).toMatchObject({
      status: 409,
      code: "daily_limit_exceeded",
      message: "409 daily_limit_exceeded: guest daily limit is 10",
    });
  });

  it("rejects responses that do not match the schema", async () => {
    stubFetch(200, JSON.stringify({ pending: 5 }));
    await expect(httpGet(config, "/p", Type.Object({ pending: Type.String() }))).rejects.toThrow(
      "unexpected response from GET /p at /pending",
    );
  });
});
