import { createServer, type Server } from "node:http";

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";

import { BalanceClient, extractCookieValue, looksLikeLoginExpired, parseBalancePayload } from "./client.js";

const meterPayload = (balance: unknown) => ({
  Tag: 1,
  Message: "",
  Data: {
    RoomName: "Block 3 / 512",
    DevicesList: [
      { DeviceType: 2, DeviceName: "Water", DeviceBalance: 8 },
      {
        DeviceType: 1,
        DeviceName: "Electric meter",
        DeviceBalance: balance,
        DevicePrice: "0.62",
        UpdateTime: "2024-05-01 07:55",
        IsOnline: 1,
        SwitchStatus: 0,
      },
    ],
  },
});

const json = (body: unknown, init: ResponseInit = {}) => new Response(JSON.stringify(body), init);

describe("parseBalancePayload", () => {
  it("reads the meter device", () => {
    expect(parseBalancePayload(meterPayload("23.4"))).toEqual({
      balance: 23.4,
      roomName: "Block 3 / 512",
      deviceName: "Electric meter",
      price: 0.62,
      updateTime: "2024-05-01 07:55",
      online: true,
      switchOn: false,
    });
  });

  it("rejects payloads without a meter", () => {
    expect(() =>
      parseBalancePayload({ Tag: 1, Data: { DevicesList: [{ DeviceType: 2, DeviceBalance: 1 }] } }),
    ).toThrow("No electricity meter device found");
    expect(() => parseBalancePayload({ Tag: 1, Data: { DevicesList: [] } })).toThrow("No bound devices found");
  });

  it("rejects a non-numeric balance", () => {
    expect(() => parseBalancePayload(meterPayload("n/a"))).toThrow("Meter balance is missing or not numeric");
  });

  it("surfaces the portal message on errors", () => {
    expect(() => parseBalancePayload({ Tag: 0, Message: "系统维护" })).toThrow("Balance service error: 系统维护");
  });
});

describe("looksLikeLoginExpired", () => {
  it("matches known expiry phrases", () => {
    expect(looksLikeLoginExpired("您的登录已过期，请重新登录")).toBe(true);
    expect(looksLikeLoginExpired("Token过期")).toBe(true);
    expect(looksLikeLoginExpired("系统维护")).toBe(false);
  });
});

describe("extractCookieValue", () => {
  it("finds the named cookie among several", () => {
    expect(
      extractCookieValue("ASP.NET_SessionId=abc; path=/, AppUserToken=tok-123; path=/; HttpOnly", "AppUserToken"),
    ).toBe("tok-123");
  });

  it("returns null for a missing or empty cookie", () => {
    expect(extractCookieValue(null, "AppUserToken")).toBeNull();
    expect(extractCookieValue("AppUserToken=; path=/", "AppUserToken")).toBeNull();
    expect(extractCookieValue("OtherAppUserToken=x", "AppUserToken")).toBeNull();
  });
});

describe("BalanceClient", () => {
  const fetchMock = vi.fn<[URL, RequestInit], Promise<Response>>();
  const client = new BalanceClient({ baseUrl: "http://portal.test", timeoutMs: 5_000 });

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the token as a cookie and returns the reading", async () => {
    fetchMock.mockResolvedValueOnce(json(meterPayload(18)));

    const result = await client.fetchBalance("test-token");

    expect(result).toMatchObject({ status: "ok", reading: { balance: 18, roomName: "Block 3 / 512" } });
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url?.toString()).toBe("http://portal.test/Home/GetUserBindDevices");
    expect(init?.method).toBe("POST");
    expect(new Headers(init?.headers).get("cookie")).toBe("AppUserToken=test-token");
  });

  it("maps an expiry message to auth-expired", async () => {
    fetchMock.mockResolvedValueOnce(json({ Tag: 0, Message: "请先登录" }));

    expect(await client.fetchBalance("test-token")).toEqual({ status: "auth-expired", message: "请先登录" });
  });

  it("maps 401 to auth-expired", async () => {
    fetchMock.mockResolvedValueOnce(new Response("", { status: 401 }));

    expect(await client.fetchBalance("test-token")).toEqual({
      status: "auth-expired",
      message: "Balance service rejected the token (401)",
    });
  });

  it("maps 403 to auth-expired", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Forbidden", { status: 403 }));

    expect(await client.fetchBalance("test-token")).toEqual({
      status: "auth-expired",
      message: "Balance service rejected the token (403)",
    });
  });

  it("reports other HTTP errors as failures", async () => {
    fetchMock.mockResolvedValueOnce(new Response("Bad Gateway", { status: 502 }));

    expect(await client.fetchBalance("test-token")).toEqual({ status: "failure", message: "Bad Gateway" });
  });

  it("reports malformed JSON as a failure", async () => {
    fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));

    const result = await client.fetchBalance("test-token");

    expect(result.status).toBe("failure");
    expect(result.status === "failure" && result.message.startsWith("Balance service invalid JSON:")).toBe(true);
  });

  it("reports network errors as failures", async () => {
    fetchMock.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    expect(await client.fetchBalance("test-token")).toEqual({
      status: "failure",
      message: "Balance service unavailable: ECONNREFUSED",
    });
  });

  it("logs in with a form body and reads the token cookie", async () => {
    fetchMock.mockResolvedValueOnce(
      json({ Tag: 1, Message: "ok" }, { headers: { "set-cookie": "AppUserToken=fresh-token; path=/" } }),
    );

    await expect(client.login("tester", "test-password")).resolves.toBe("fresh-token");
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url?.toString()).toBe("http://portal.test/Login/LoginJson");
    expect(init?.body).toBe("account=tester&password=test-password");
  });

  it("rejects a login the portal refused", async () => {
    fetchMock.mockResolvedValueOnce(json({ Tag: 0, Message: "密码错误" }));

    await expect(client.login("tester", "test-password")).rejects.toThrow("Login failed: 密码错误");
  });

  it("rejects a login without a token cookie", async () => {
    fetchMock.mockResolvedValueOnce(json({ Tag: 1 }));

    await expect(client.login("tester", "test-password")).rejects.toThrow(
      "Login succeeded but token cookie is missing",
    );
  });
});

describe("BalanceClient against a local portal", () => {
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    server = createServer((req, res) => {
      if (req.url === "/Home/GetUserBindDevices" && req.headers.cookie === "AppUserToken=stale-token") {
        res.writeHead(302, { Location: "/Login/Login" });
        res.end();
        return;
      }
      if (req.url === "/Login/Login") {
        res.writeHead(200, { "Content-Type": "text/html" });
        res.end("<html>login</html>");
        return;
      }
      if (req.url === "/Home/GetUserBindDevices" && req.headers.cookie === "AppUserToken=stalled-token") {
        res.writeHead(200, { "Content-Type": "application/json" });
        res.write('{"Tag":1,');
        return;
      }
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(meterPayload(31)));
    });
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it("reads a balance over HTTP", async () => {
    const client = new BalanceClient({ baseUrl, timeoutMs: 2_000 });

    expect(await client.fetchBalance("test-token")).toMatchObject({ status: "ok", reading: { balance: 31 } });
  });

  it("treats a redirect to the login page as an expired token", async () => {
    const client = new BalanceClient({ baseUrl, timeoutMs: 2_000 });

    expect(await client.fetchBalance("stale-token")).toEqual({
      status: "auth-expired",
      message: "Balance service redirected to the login page",
    });
  });

  it("gives up on a body that stops arriving", async () => {
    const client = new BalanceClient({ baseUrl, timeoutMs: 100 });

    const result = await client.fetchBalance("stalled-token");

    expect(result).toEqual({
      status: "failure",
      message: expect.stringMatching(/^Balance service unavailable: /),
    });
  }, 5_000);
});
