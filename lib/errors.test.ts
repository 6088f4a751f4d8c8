import assert from "node:assert/strict";
import test from "node:test";
import {
  AttemptTimeoutError,
  BatchNotFoundError,
  classifyFailure,
  DownloadFailedError,
  httpStatusForError,
  InvalidParameterError,
  InvalidRequestError,
  isThrottleError,
  MissingLockError,
  RateLimitError,
  ServiceUnavailableError,
  StyleAlreadyLockedError,
} from "./errors";

test("classifyFailure trusts the adapter's classification and defaults to transient", () => {
  assert.equal(classifyFailure(new InvalidRequestError("bad prompt")), "permanent");
  assert.equal(classifyFailure(new DownloadFailedError("reset")), "transient");
  assert.equal(classifyFailure(new AttemptTimeoutError(100)), "transient");
  assert.equal(classifyFailure(new Error("socket hang up")), "transient");
  assert.equal(classifyFailure("weird"), "transient");
});

test("only rate limits and unavailability count as throttling", () => {
  assert.equal(isThrottleError(new RateLimitError("slow down")), true);
  assert.equal(isThrottleError(new ServiceUnavailableError("busy")), true);
  assert.equal(isThrottleError(new DownloadFailedError("reset")), false);
});

test("httpStatusForError maps the taxonomy to HTTP statuses", () => {
  assert.equal(httpStatusForError(new InvalidParameterError("steps: too small", "steps")), 400);
  assert.equal(httpStatusForError(new MissingLockError("demo")), 404);
  assert.equal(httpStatusForError(new BatchNotFoundError("batch-1")), 404);
  assert.equal(httpStatusForError(new StyleAlreadyLockedError("demo", "demo@v1")), 409);
  assert.equal(httpStatusForError(new RateLimitError("slow down")), 429);
  assert.equal(httpStatusForError(new AttemptTimeoutError(100)), 504);
  assert.equal(httpStatusForError(new Error("boom")), 500);
});

test("MissingLockError names the project", () => {
  assert.equal(new MissingLockError("demo").message, 'No approved locked style for project "demo"');
});
