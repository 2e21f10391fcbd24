import { describe, it, expect } from "vitest";
import {
  andExp,
  applyExp,
  cmpExp,
  defineFunction,
  elemExp,
  existsExp,
  litExp,
  orExp,
  tupleExp,
  varExp,
} from "../../src/expr/builders.js";
import { prettyPrint } from "../../src/expr/printer.js";
import { MapEnvironment } from "../../src/env/environment.js";
import { Evaluator } from "../../src/eval/evaluator.js";
import { analyze, invert } from "../../src/inversion/dispatcher.js";
import { isClosureShaped } from "../../src/inversion/closure.js";
import { toQuery } from "../../src/inversion/generator.js";
import { graphEnv, pairs, reachability, sorted, x, y, z } from "../helpers/graphs.js";

const pathXY = applyExp("path", x, y);

function enumerate(env: MapEnvironment, goal: string[], call = pathXY) {
  const result = invert(call, goal, { env });
  if (!result) throw new Error("expected a generator");
  const evaluator = new Evaluator(env);
  return { result, rows: evaluator.collection(toQuery(result)), stats: evaluator.stats };
}

describe("Transitive-Closure Synthesizer", () => {
  it("should recognize closure-shaped definitions", () => {
    expect(isClosureShaped(reachability("path", "edges"))).toBe(true);
    expect(isClosureShaped(defineFunction("f", ["x"], elemExp(x, varExp("r"))))).toBe(false);
  });

  describe("basic closure", () => {
    const env = graphEnv([
      [1, 2],
      [2, 3],
    ]);

    it("should enumerate the transitive closure", () => {
      const { rows } = enumerate(env, ["x", "y"]);
      expect(rows).toEqual([
        [1, 2],
        [2, 3],
        [1, 3],
      ]);
    });

    it("should return a finite iterate generator with duplicates possible", () => {
      const { result } = enumerate(env, ["x", "y"]);
      expect(result.generator.cardinality).toBe("FINITE");
      expect(result.mayHaveDuplicates).toBe(true);
      expect(result.satisfiedPats).toEqual(["x", "y"]);
      expect(result.remainingFilters).toEqual([]);
      expect(result.isSupersetOfSolution).toBe(false);
      expect(prettyPrint(result.generator.exp)).toBe(
        "iterate(edges, fn acc$2 => from (z, y) in acc$2, " +
          "x in (from (x, z$1) in edges where z$1 = z yield x) yield (x, y))"
      );
    });

    it("should join each round's new tuples once", () => {
      const { stats } = enumerate(env, ["x", "y"]);
      expect(stats.stepCalls).toBe(2);
      expect(stats.iterations).toBe(1);
    });

    it("should log the seed and the step", () => {
      const report = analyze(pathXY, ["x", "y"], { env });
      expect(report.logs).toContain("[Closure] path seed: edges");
      expect(report.logs.filter((l) => l.startsWith("[Closure] path step: "))).toHaveLength(1);
    });
  });

  describe("call sites", () => {
    const env = graphEnv([
      [1, 2],
      [2, 3],
      [3, 4],
    ]);

    it("should adapt a literal argument with an equality", () => {
      const { result, rows } = enumerate(env, ["y"], applyExp("path", litExp(1), y));
      expect(result.satisfiedPats).toEqual(["y"]);
      expect(rows).toEqual([2, 3, 4]);
    });

    it("should rename parameters to the caller's variables", () => {
      const { result, rows } = enumerate(env, ["a", "b"], applyExp("path", varExp("a"), varExp("b")));
      expect(result.generator.bound).toEqual(["a", "b"]);
      expect(rows).toHaveLength(6);
    });

    it("should handle the same variable in both positions", () => {
      const cyclic = graphEnv([
        [1, 2],
        [2, 1],
        [3, 4],
      ]);
      const { rows } = enumerate(cyclic, ["x"], applyExp("path", x, x));
      expect(rows).toEqual([2, 1]);
    });
  });

  describe("empty base", () => {
    it("should produce nothing without calling the step", () => {
      const { rows, stats } = enumerate(graphEnv([]), ["x", "y"]);
      expect(rows).toEqual([]);
      expect(stats.stepCalls).toBe(0);
      expect(stats.iterations).toBe(0);
    });
  });

  describe("cycles", () => {
    it("should terminate and report each reachable pair once", () => {
      const { rows } = enumerate(
        graphEnv([
          [1, 2],
          [2, 3],
          [3, 1],
        ]),
        ["x", "y"]
      );
      expect(rows).toHaveLength(9);
      expect(sorted(rows)).toEqual([
        "[1,1]", "[1,2]", "[1,3]",
        "[2,1]", "[2,2]", "[2,3]",
        "[3,1]", "[3,2]", "[3,3]",
      ]);
    });
  });

  describe("multiple seed relations", () => {
    it("should union the base branches into one seed", () => {
      const env = new MapEnvironment()
        .defineRelation("roads", pairs([[1, 2]]))
        .defineRelation("rails", pairs([[2, 3]]))
        .defineFunction(
          defineFunction(
            "link",
            ["x", "y"],
            orExp(
              orExp(elemExp(tupleExp(x, y), varExp("roads")), elemExp(tupleExp(x, y), varExp("rails"))),
              existsExp(["z"], andExp(elemExp(tupleExp(x, z), varExp("roads")), applyExp("link", z, y)))
            )
          )
        );
      const report = analyze(applyExp("link", x, y), ["x", "y"], { env });
      expect(report.logs).toContain("[Union] 2 branches over (x, y)");
      const { rows } = enumerate(env, ["x", "y"], applyExp("link", x, y));
      expect(rows).toEqual([
        [1, 2],
        [2, 3],
        [1, 3],
      ]);
    });
  });

  describe("cardinality gate", () => {
    it("should refuse an unbounded base case", () => {
      const env = new MapEnvironment()
        .defineExtent("nodes")
        .defineRelation("edges", pairs([[1, 2]]))
        .defineFunction(reachability("reach", "nodes", "edges"));
      const report = analyze(applyExp("reach", x, y), ["x", "y"], { env });
      expect(report.result).toBeNull();
      expect(report.failure?.kind).toBe("UnboundedBase");
      expect(report.logs.some((l) => l.startsWith("[Closure]"))).toBe(false);
    });

    it("should refuse a base case that leaves a variable unbound", () => {
      const env = new MapEnvironment()
        .defineRelation("starts", [1, 2])
        .defineRelation("edges", pairs([[1, 2]]))
        .defineFunction(
          defineFunction(
            "r",
            ["x", "y"],
            orExp(
              andExp(elemExp(x, varExp("starts")), cmpExp("=", y, x)),
              existsExp(["z"], andExp(elemExp(tupleExp(x, z), varExp("edges")), applyExp("r", z, y)))
            )
          )
        );
      expect(analyze(applyExp("r", x, y), ["x", "y"], { env }).failure).toEqual({
        kind: "UnboundedBase",
        message: "r: base case does not bind y",
      });
    });
  });

  describe("unsupported shapes", () => {
    const edges = pairs([[1, 2]]);

    it("should reject more than one self-call", () => {
      const env = new MapEnvironment().defineRelation("edges", edges).defineFunction(
        defineFunction(
          "twice",
          ["x", "y"],
          orExp(
            elemExp(tupleExp(x, y), varExp("edges")),
            existsExp(["z"], andExp(applyExp("twice", x, z), applyExp("twice", z, y)))
          )
        )
      );
      expect(analyze(applyExp("twice", x, y), ["x", "y"], { env }).failure).toEqual({
        kind: "UnsupportedRecursion",
        message: "twice: expected exactly one self-call, found 2",
      });
    });

    it("should reject a recursive case that is not an existential", () => {
      const env = new MapEnvironment().defineRelation("edges", edges).defineFunction(
        defineFunction(
          "r",
          ["x", "y"],
          orExp(
            elemExp(tupleExp(x, y), varExp("edges")),
            andExp(elemExp(tupleExp(x, y), varExp("edges")), applyExp("r", x, y))
          )
        )
      );
      expect(analyze(applyExp("r", x, y), ["x", "y"], { env }).failure).toEqual({
        kind: "UnsupportedShape",
        message: "r: recursive case must be an existential",
      });
    });

    it("should reject a self-call nested below the top-level conjuncts", () => {
      const env = new MapEnvironment().defineRelation("edges", edges).defineFunction(
        defineFunction(
          "r",
          ["x", "y"],
          orExp(
            elemExp(tupleExp(x, y), varExp("edges")),
            existsExp(
              ["z"],
              andExp(elemExp(tupleExp(x, z), varExp("edges")), orExp(applyExp("r", z, y), cmpExp("=", z, y)))
            )
          )
        )
      );
      expect(analyze(applyExp("r", x, y), ["x", "y"], { env }).failure).toEqual({
        kind: "UnsupportedShape",
        message: "r: self-call must be a top-level conjunct",
      });
    });

    it("should reject a step that refers to an unknown name", () => {
      const guarded = defineFunction(
        "p",
        ["x", "y"],
        orExp(
          elemExp(tupleExp(x, y), varExp("edges")),
          existsExp(
            ["z"],
            andExp(
              andExp(elemExp(tupleExp(x, z), varExp("edges")), applyExp("p", z, y)),
              cmpExp("<", z, varExp("limit"))
            )
          )
        )
      );
      const env = new MapEnvironment().defineRelation("edges", edges).defineFunction(guarded);
      expect(analyze(applyExp("p", x, y), ["x", "y"], { env }).failure).toEqual({
        kind: "UnsupportedShape",
        message: "p: step refers to unbound limit",
      });

      env.defineValue("limit", 10);
      expect(invert(applyExp("p", x, y), ["x", "y"], { env })?.satisfiedPats).toEqual(["x", "y"]);
    });

    it("should reject a self-recursive disjunction nested inside a conjunction", () => {
      const env = new MapEnvironment().defineRelation("edges", edges).defineFunction(
        defineFunction(
          "r",
          ["x", "y"],
          andExp(
            elemExp(tupleExp(x, y), varExp("edges")),
            orExp(
              cmpExp("=", x, y),
              existsExp(["z"], andExp(elemExp(tupleExp(x, z), varExp("edges")), applyExp("r", z, y)))
            )
          )
        )
      );
      expect(analyze(applyExp("r", x, y), ["x", "y"], { env }).failure?.kind).toBe("UnsupportedRecursion");
    });
  });
});
