import { describe, expect, it } from "vitest";
import { classifyStatus, StatusCodes } from "../src/core/status-codes";

describe("classifyStatus", () => {
  it("should treat 200 and 201 as success", () => {
    expect(classifyStatus(200)).toEqual({ kind: "success", status: 200, created: false });
    expect(classifyStatus(201)).toEqual({ kind: "success", status: 201, created: true });
  });

  it("should treat 202 as processing", () => {
    expect(classifyStatus(StatusCodes.PROCESSING)).toEqual({
      kind: "processing",
      status: 202,
    });
  });

  it.each([
    [302, "redirect"],
    [400, "malformed"],
    [401, "unauthorized"],
    [403, "forbidden"],
    [404, "not_found"],
    [422, "rejected"],
  ])("should classify %i as a client error (%s)", (status, reason) => {
    expect(classifyStatus(status)).toEqual({ kind: "client_error", status, reason });
  });

  it.each([
    [409, "done_with_errors"],
    [410, "job_failed"],
    [499, "timeout"],
    [500, "server_down"],
    [503, "api_disabled"],
    [0, "transport"],
    [502, "unexpected"],
    [600, "unexpected"],
  ])("should classify %i as a server error (%s)", (status, reason) => {
    expect(classifyStatus(status)).toEqual({ kind: "server_error", status, reason });
  });

  it("should fall back to success for other 2xx codes", () => {
    expect(classifyStatus(204)).toEqual({ kind: "success", status: 204, created: false });
  });
});
