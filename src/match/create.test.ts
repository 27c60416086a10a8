/**
 * Tests for create.ts - matchers with their own options
 */
import { describe, it, expect, vi, afterEach } from "vitest";
import { MatchDefinitionError, NonExhaustiveMatchError } from "../errors";
import { createMatcher, exhaustive, orElseValue, type MatchEvent } from "./index";

type Circle = { readonly type: "circle"; readonly radius: number };
type Square = { readonly type: "square"; readonly side: number };
type Shape = Circle | Square;

const circle = (radius: number): Shape => ({ type: "circle", radius });
const square = (side: number): Shape => ({ type: "square", side });

type Job =
  | { readonly _tag: "Queued" }
  | { readonly _tag: "Running"; readonly progress: number }
  | { readonly _tag: "Failed"; readonly reason: string };

const queued = (): Job => ({ _tag: "Queued" });
const running = (progress: number): Job => ({ _tag: "Running", progress });
const failed = (reason: string): Job => ({ _tag: "Failed", reason });

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createMatcher", () => {
  describe("discriminant", () => {
    const ShapeMatch = createMatcher({ discriminant: "type" });

    it("reads tags from the configured field", () => {
      const area = (shape: Shape) =>
        ShapeMatch.value(shape)({
          circle: (c) => c.radius * c.radius * 3,
          square: (s) => s.side * s.side,
        });

      expect(area(circle(2))).toBe(12);
      expect(area(square(3))).toBe(9);
    });

    it("is used by matchValue tag clauses", () => {
      const name = ShapeMatch.matchValue(
        square(1),
        { tag: "circle", then: () => "circle" },
        { tag: "square", then: () => "square" },
        exhaustive
      );
      expect(name).toBe("square");
    });

    it("is used by the fluent matchers", () => {
      const sides = ShapeMatch.type<Shape>()
        .tag("circle", () => 0)
        .tag("square", () => 4)
        .exhaustive();

      expect(sides(square(2))).toBe(4);
      expect(ShapeMatch.on(circle(1)).tag("circle", (c) => c.radius).orElseValue(0)).toBe(1);
    });

    it("is used by partial handler maps", () => {
      const result = ShapeMatch.partial(square(2))({ circle: () => "round" }, (s) => s.type);
      expect(result).toBe("square");
    });

    it("is used by guards and tagOf", () => {
      const isCircle = ShapeMatch.is<Shape, "circle">("circle");
      expect(isCircle(circle(1))).toBe(true);
      expect(isCircle(square(1))).toBe(false);
      expect(ShapeMatch.tagOf(square(1))).toBe("square");
      expect(ShapeMatch.tagOf({ _tag: "circle" })).toBeUndefined();
    });

    it("is used by the case kit", () => {
      const C = ShapeMatch.cases<Shape>();
      const describeShape = (shape: Shape) =>
        ShapeMatch.matchValue(
          shape,
          C.tag("circle", (c) => `circle ${c.radius}`),
          C.tags(["square"], (s) => `square ${s.side}`),
          exhaustive
        );

      expect(describeShape(circle(2))).toBe("circle 2");
      expect(describeShape(square(5))).toBe("square 5");
    });

    it("is used by isOneOf", () => {
      const isRound = ShapeMatch.isOneOf<Shape, "circle"[]>("circle");
      expect(isRound(circle(1))).toBe(true);
      expect(isRound(square(1))).toBe(false);
    });

    it("exposes the discriminant", () => {
      expect(ShapeMatch.discriminant).toBe("type");
      expect(createMatcher().discriminant).toBe("_tag");
    });

    it("rejects an empty discriminant", () => {
      expect(() => createMatcher({ discriminant: "" })).toThrow(MatchDefinitionError);
      expect(() => createMatcher({ discriminant: "" })).toThrow(
        "MatchDefinitionError: discriminant must be a non-empty field name"
      );
    });
  });

  describe("name", () => {
    it("appears in NonExhaustiveMatchError messages", () => {
      const JobMatch = createMatcher({ name: "jobStatus" });

      const run = () =>
        JobMatch.matchValue(failed("disk full"), { tag: "Queued", then: () => 0 }, exhaustive);

      expect(run).toThrow(NonExhaustiveMatchError);
      expect(run).toThrow(
        'NonExhaustiveMatchError: no case matched variant "Failed" in jobStatus'
      );
    });
  });

  describe("onEvent", () => {
    it("reports the winning case", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({
        name: "jobs",
        onEvent: (event) => events.push(event),
      });

      JobMatch.matchValue(
        running(50),
        { tag: "Queued", then: () => "waiting" },
        { tag: "Running", then: () => "busy" },
        orElseValue("done")
      );

      expect(events).toEqual([
        {
          type: "match_case",
          matcher: "jobs",
          index: 1,
          label: "tag:Running",
          ts: expect.any(Number),
        },
      ]);
    });

    it("reports the default", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({ onEvent: (event) => events.push(event) });

      JobMatch.matchValue(failed("x"), { tag: "Queued", then: () => 1 }, orElseValue(0));

      expect(events).toEqual([
        { type: "match_default", label: "orElseValue", ts: expect.any(Number) },
      ]);
    });

    it("reports unmatched values before throwing", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({
        name: "jobs",
        onEvent: (event) => events.push(event),
      });

      expect(() =>
        JobMatch.matchValue(queued(), { tag: "Running", then: () => 1 }, exhaustive)
      ).toThrow(NonExhaustiveMatchError);

      expect(events).toEqual([
        {
          type: "match_unmatched",
          matcher: "jobs",
          tag: "Queued",
          ts: expect.any(Number),
        },
      ]);
    });

    it("reports handler-map dispatch with the handler's position", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({ onEvent: (event) => events.push(event) });

      JobMatch.value(failed("x"))({
        Queued: () => 0,
        Running: () => 1,
        Failed: () => 2,
      });
      JobMatch.partial(queued())({ Running: () => 1 }, () => -1);

      expect(events).toEqual([
        { type: "match_case", index: 2, label: "tag:Failed", ts: expect.any(Number) },
        { type: "match_default", label: "fallback", ts: expect.any(Number) },
      ]);
    });

    it("reports fluent matches with the case label", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({ onEvent: (event) => events.push(event) });

      JobMatch.type<Job>()
        .when(() => false, () => "never")
        .tags(["Queued", "Running"], () => "active")
        .orElse(() => "inactive")(running(1));

      expect(events).toEqual([
        {
          type: "match_case",
          index: 1,
          label: "tags:Queued|Running",
          ts: expect.any(Number),
        },
      ]);
    });

    it("lets errors from the hook reach the caller", () => {
      const JobMatch = createMatcher({
        onEvent: () => {
          throw new Error("hook failed");
        },
      });

      expect(() =>
        JobMatch.matchValue(queued(), { tag: "Queued", then: () => 1 }, exhaustive)
      ).toThrow("hook failed");
    });
  });

  describe("warnings", () => {
    it("warns about unknown options", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const options = { name: "jobs", strict: true };

      createMatcher(options);

      expect(warn).toHaveBeenCalledWith(
        "casewise: Unknown matcher options (strict) are ignored.\n" +
          "Known options: discriminant, name, onEvent, warnUnreachable"
      );
    });

    it("does not warn about known options", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

      createMatcher({ name: "jobs", warnUnreachable: true });

      expect(warn).not.toHaveBeenCalled();
    });

    it("warns once for a call site that runs repeatedly", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const JobMatch = createMatcher({ name: "jobs" });
      const label = (job: Job) =>
        JobMatch.matchValue(
          job,
          { tag: "Queued", then: () => "first" },
          { tag: "Queued", then: () => "second" },
          orElseValue("other")
        );

      for (let i = 0; i < 5; i++) {
        expect(label(queued())).toBe("first");
      }

      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith(
        'casewise: case 1 (tag "Queued") can never run: an earlier case handles that tag'
      );
    });

    it("reports case kit labels in events", () => {
      const events: MatchEvent[] = [];
      const JobMatch = createMatcher({ onEvent: (event) => events.push(event) });
      const C = JobMatch.cases<Job>();

      JobMatch.matchValue(
        running(10),
        C.tags(["Queued", "Running"], () => "active"),
        C.tag("Failed", (f) => f.reason),
        exhaustive
      );

      expect(events).toEqual([
        {
          type: "match_case",
          index: 0,
          label: "tags:Queued|Running",
          ts: expect.any(Number),
        },
      ]);
    });

    it("stays quiet about unreachable cases when warnUnreachable is false", () => {
      const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const JobMatch = createMatcher({ warnUnreachable: false });

      const result = JobMatch.matchValue(
        queued(),
        { tag: "Queued", then: () => "first" },
        { tag: "Queued", then: () => "second" },
        exhaustive
      );

      expect(result).toBe("first");
      expect(warn).not.toHaveBeenCalled();
    });
  });
});
