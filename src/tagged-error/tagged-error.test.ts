/**
 * Tests for tagged-error - TaggedError factory and matching statics
 */
import { describe, it, expect, vi } from "vitest";
import { NonExhaustiveMatchError } from "../errors";
import { TaggedError, isTaggedError, type TagOf, type TaggedErrorBase } from "./index";

class UserNotFound extends TaggedError("UserNotFound")<{ userId: string }> {}

class InsufficientFunds extends TaggedError("InsufficientFunds", {
  message: (p: { required: number; available: number }) =>
    `Need ${p.required}, have ${p.available}`,
}) {}

class SessionExpired extends TaggedError("SessionExpired") {}

type PaymentError = UserNotFound | InsufficientFunds | SessionExpired;

const userNotFound = (userId: string): PaymentError => new UserNotFound({ userId });
const insufficientFunds = (required: number, available: number): PaymentError =>
  new InsufficientFunds({ required, available });
const sessionExpired = (): PaymentError => new SessionExpired();

describe("TaggedError", () => {
  it("creates errors carrying their tag and props", () => {
    const error = new UserNotFound({ userId: "user-1" });

    expect(error._tag).toBe("UserNotFound");
    expect(error.name).toBe("UserNotFound");
    expect(error.userId).toBe("user-1");
    expect(error.message).toBe("UserNotFound");
  });

  it("builds the message from props", () => {
    const error = new InsufficientFunds({ required: 100, available: 40 });

    expect(error.message).toBe("Need 100, have 40");
    expect(error.required).toBe(100);
  });

  it("allows omitting props when there are none", () => {
    expect(new SessionExpired()._tag).toBe("SessionExpired");
  });

  it("passes a cause prop to Error", () => {
    class Wrapped extends TaggedError("Wrapped")<{ cause: unknown }> {}
    const root = new Error("root");

    expect(new Wrapped({ cause: root }).cause).toBe(root);
  });

  it("produces Error instances recognised by instanceof TaggedError", () => {
    const error = new UserNotFound({ userId: "user-1" });

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(UserNotFound);
    expect(error instanceof TaggedError).toBe(true);
    expect(new Error("plain") instanceof TaggedError).toBe(false);
  });

  it("keeps classes with different tags apart", () => {
    const error = new UserNotFound({ userId: "user-1" });
    expect(error instanceof InsufficientFunds).toBe(false);
  });

  it("recognises tagged errors with is and isTaggedError", () => {
    expect(TaggedError.is(new SessionExpired())).toBe(true);
    expect(isTaggedError(new Error("plain"))).toBe(false);
    expect(isTaggedError({ _tag: "UserNotFound" })).toBe(false);
  });

  it("exposes the tag union at the type level", () => {
    const tags: TagOf<PaymentError>[] = ["UserNotFound", "InsufficientFunds", "SessionExpired"];
    expect(tags).toHaveLength(3);
  });
});

describe("TaggedError.match", () => {
  const status = (error: PaymentError) =>
    TaggedError.match(error, {
      UserNotFound: (e) => `404 ${e.userId}`,
      InsufficientFunds: (e) => `402 ${e.required - e.available}`,
      SessionExpired: () => "401",
    });

  it("runs the handler for the error's tag", () => {
    expect(status(userNotFound("user-9"))).toBe("404 user-9");
    expect(status(insufficientFunds(50, 20))).toBe("402 30");
    expect(status(sessionExpired())).toBe("401");
  });

  it("throws NonExhaustiveMatchError for an error with no handler", () => {
    class Unexpected extends TaggedError("Unexpected") {}
    const error: TaggedErrorBase = new Unexpected();

    expect(() =>
      TaggedError.match(error, { UserNotFound: () => 1 })
    ).toThrow('NonExhaustiveMatchError: no case matched variant "Unexpected"');
  });
});

describe("TaggedError.matchPartial", () => {
  it("handles some tags and falls back for the rest", () => {
    const retry = vi.fn((e: PaymentError) => `retry after ${e._tag}`);

    const first = TaggedError.matchPartial(
      sessionExpired(),
      { UserNotFound: () => "give up" },
      retry
    );
    const second = TaggedError.matchPartial(
      userNotFound("user-2"),
      { UserNotFound: () => "give up" },
      retry
    );

    expect(first).toBe("retry after SessionExpired");
    expect(second).toBe("give up");
    expect(retry).toHaveBeenCalledTimes(1);
  });

  it("narrows the fallback to the unhandled errors", () => {
    const result = TaggedError.matchPartial(
      insufficientFunds(10, 5),
      { UserNotFound: () => 0, SessionExpired: () => 0 },
      (e) => e.required
    );

    expect(result).toBe(10);
  });
});

describe("errors from the matchers", () => {
  it("are tagged errors", () => {
    const error = new NonExhaustiveMatchError({ value: 1 });
    expect(error instanceof TaggedError).toBe(true);
    expect(error._tag).toBe("NonExhaustiveMatchError");
  });
});
