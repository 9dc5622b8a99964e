import { describe, expect, it } from "vitest";
import { extractJsessionId, parseSetCookie, sessionHeaders } from "./cookies";

describe("session cookies", () => {
  const headers = {
    "content-type": "text/html",
    "set-cookie": ["JSESSIONID=A1B2.node-3; Path=/; HttpOnly", "theme=dark; Path=/"],
  };

  it("should find the session id in Set-Cookie", () => {
    expect(extractJsessionId(headers)).toBe("JSESSIONID=A1B2.node-3");
  });

  it("should return undefined without a session", () => {
    expect(extractJsessionId({ "content-type": "text/html" })).toBeUndefined();
  });

  it("should parse cookie pairs without attributes", () => {
    expect(parseSetCookie(headers)).toEqual({ JSESSIONID: "A1B2.node-3", theme: "dark" });
    expect(parseSetCookie({ "set-cookie": "single=1; Secure" })).toEqual({ single: "1" });
    expect(parseSetCookie({})).toEqual({});
  });

  it("should build the Cookie header for the next request", () => {
    expect(sessionHeaders(headers)).toEqual(["Cookie: JSESSIONID=A1B2.node-3"]);
    expect(sessionHeaders({})).toEqual([]);
  });
});
