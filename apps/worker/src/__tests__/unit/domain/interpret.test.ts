import { describe, it, expect } from "vitest";
import { interpretResponse } from "../../../domain/invoice-response/index.js";

describe("interpretResponse", () => {
  describe("successful HTTP responses", () => {
    it("should treat COMPLETED as success", () => {
      expect(interpretResponse(200, '{"success":true,"status":"COMPLETED"}')).toEqual({
        kind: "success",
        remoteStatus: "COMPLETED",
      });
    });

    it("should accept any 2xx status", () => {
      expect(interpretResponse(202, '{"status":"COMPLETED"}').kind).toBe("success");
    });

    it.each(["NO_FIRMADO", "NO_WS1", "NO_WS2", "NO_ZIP", "ERROR"])(
      "should retry remote status %s",
      (status) => {
        expect(interpretResponse(200, JSON.stringify({ status }))).toEqual({
          kind: "retryable",
          failureType: "RemoteRetryable",
          reason: `remote status ${status}`,
        });
      }
    );

    it("should match remote statuses regardless of case", () => {
      expect(interpretResponse(200, '{"status":"completed"}')).toEqual({
        kind: "success",
        remoteStatus: "COMPLETED",
      });
      expect(interpretResponse(200, '{"status":"No_Firmado"}')).toEqual({
        kind: "retryable",
        failureType: "RemoteRetryable",
        reason: "remote status NO_FIRMADO",
      });
    });

    it("should not accept the local store's status names from the remote", () => {
      expect(interpretResponse(200, '{"status":"NOT_SIGNED"}')).toEqual({
        kind: "permanent",
        failureType: "RemotePermanent",
        reason: "unrecognized remote status NOT_SIGNED",
      });
    });

    it("should fail closed on an unknown remote status", () => {
      expect(interpretResponse(200, '{"status":"ARCHIVED"}')).toEqual({
        kind: "permanent",
        failureType: "RemotePermanent",
        reason: "unrecognized remote status ARCHIVED",
      });
    });

    it("should fail closed on a body that is not JSON", () => {
      expect(interpretResponse(200, "<html>ok</html>")).toEqual({
        kind: "permanent",
        failureType: "RemotePermanent",
        reason: "response body is not JSON",
      });
    });

    it("should fail closed on a body without status", () => {
      expect(interpretResponse(200, '{"success":true}')).toEqual({
        kind: "permanent",
        failureType: "RemotePermanent",
        reason: "response body has no status",
      });
    });

    it("should ignore extra fields in the body", () => {
      expect(interpretResponse(200, '{"status":"COMPLETED","data":{"ref":"a-1"},"extra":1}').kind).toBe(
        "success"
      );
    });
  });

  describe("HTTP errors", () => {
    it.each([408, 425, 429, 500, 502, 503, 504])("should retry HTTP %i as transient", (status) => {
      expect(interpretResponse(status, "")).toEqual({
        kind: "retryable",
        failureType: "TransientInfra",
        reason: `HTTP ${status}`,
      });
    });

    it.each([401, 403])("should reject HTTP %i as an auth failure", (status) => {
      expect(interpretResponse(status, "")).toEqual({
        kind: "permanent",
        failureType: "AuthRejected",
        reason: `HTTP ${status}`,
      });
    });

    it.each([400, 404, 409, 422, 501])("should treat HTTP %i as permanent", (status) => {
      expect(interpretResponse(status, '{"status":"COMPLETED"}')).toEqual({
        kind: "permanent",
        failureType: "RemotePermanent",
        reason: `HTTP ${status}`,
      });
    });
  });
});
