import { describe, it, expect } from "vitest";
import {
  andExp,
  applyExp,
  cmpExp,
  conjunction,
  elemExp,
  existsExp,
  fromExp,
  idPat,
  litExp,
  tupleExp,
  varExp,
  varsTuple,
} from "../../src/expr/builders.js";
import type { Exp } from "../../src/expr/types.js";
import type { Environment } from "../../src/env/environment.js";
import { MapEnvironment } from "../../src/env/environment.js";
import { Evaluator } from "../../src/eval/evaluator.js";
import { valueToExp, type Value } from "../../src/eval/values.js";
import { EvaluationError } from "../../src/errors.js";
import { solve } from "../../src/engine/query.js";
import { graphEnv, nums, pairs, reachability, sorted, x, y } from "../helpers/graphs.js";

/**
 * Reference answer: scan every domain and keep what satisfies the predicate
 */
function exhaustive(
  exp: Exp,
  goal: string[],
  domains: Record<string, Value[]>,
  env: Environment
): Value[] {
  const query = fromExp(
    goal.map((v) => ({ pat: idPat(v), exp: valueToExp(domains[v]) })),
    varsTuple(goal),
    exp
  );
  return [...new Evaluator(env).collection(query)];
}

describe("solve", () => {
  describe("generator strategy", () => {
    const env = graphEnv([
      [1, 2],
      [2, 3],
    ]);

    it("should enumerate through the synthesized generator", () => {
      const solved = solve(applyExp("path", x, y), ["x", "y"], { env });
      expect(solved.strategy).toBe("generator");
      expect(solved.rows).toEqual([
        [1, 2],
        [2, 3],
        [1, 3],
      ]);
      expect(solved.logs).toContain("[Solve] 3 rows (generator)");
      expect(solved.stats).toEqual({ iterations: 1, stepCalls: 2 });
    });

    it("should give the same rows without memoization", () => {
      const memo = solve(applyExp("path", x, y), ["x", "y"], { env });
      const plain = solve(applyExp("path", x, y), ["x", "y"], { env, memoize: false });
      expect(plain.rows).toEqual(memo.rows);
    });

    it("should return distinct rows", () => {
      const e = elemExp(x, nums(3, 1, 3));
      expect(solve(e, ["x"], { env }).rows).toEqual([3, 1]);
    });
  });

  describe("soundness and completeness", () => {
    const nodes = [1, 2, 3, 4];
    const domains = { x: nodes, y: nodes };

    it("should agree with exhaustive enumeration on a cyclic graph", () => {
      const env = graphEnv([
        [1, 2],
        [2, 3],
        [3, 1],
        [3, 4],
      ]);
      const e = applyExp("path", x, y);
      const solved = solve(e, ["x", "y"], { env });
      expect(solved.strategy).toBe("generator");
      expect(sorted(solved.rows)).toEqual(sorted(exhaustive(e, ["x", "y"], domains, env)));
      expect(solved.rows).toHaveLength(12);
    });

    it("should agree with exhaustive enumeration when filters remain", () => {
      const env = graphEnv([
        [1, 2],
        [2, 1],
        [2, 4],
      ]);
      const e = andExp(applyExp("path", x, y), cmpExp("<", x, y));
      const solved = solve(e, ["x", "y"], { env });
      expect(sorted(solved.rows)).toEqual(sorted(exhaustive(e, ["x", "y"], domains, env)));
      expect(sorted(solved.rows)).toEqual(["[1,2]", "[1,4]", "[2,4]"]);
    });
  });

  describe("dependent join", () => {
    const env = new MapEnvironment();

    it("should generate a second variable from the remaining conjuncts", () => {
      const e = andExp(elemExp(x, nums(1, 2)), elemExp(y, nums(10, 20)));
      const solved = solve(e, ["x", "y"], { env });
      expect(solved.strategy).toBe("generator");
      expect(solved.rows).toEqual([
        [1, 10],
        [1, 20],
        [2, 10],
        [2, 20],
      ]);
    });

    it("should scan a supplied domain for a variable no generator binds", () => {
      const e = andExp(elemExp(x, nums(1, 2)), cmpExp(">", y, x));
      const solved = solve(e, ["x", "y"], { env, domains: { y: [0, 1, 2, 3] } });
      expect(solved.strategy).toBe("generator");
      expect(solved.rows).toEqual([
        [1, 2],
        [1, 3],
        [2, 3],
      ]);
    });

    it("should join the generators of an existential chain", () => {
      const [a, b, c] = [varExp("a"), varExp("b"), varExp("c")];
      const chain = new MapEnvironment().defineRelation(
        "e",
        pairs([
          [1, 2],
          [2, 3],
          [3, 4],
          [4, 5],
        ])
      );
      const hop = (from: Exp, to: Exp) => elemExp(tupleExp(from, to), varExp("e"));
      const e = existsExp(["a", "b", "c"], conjunction([hop(x, a), hop(a, b), hop(b, c), hop(c, y)]));
      const solved = solve(e, ["x", "y"], { env: chain, domains: { y: [1, 2, 3, 4, 5] } });
      expect(solved.strategy).toBe("generator");
      expect(solved.rows).toEqual([[1, 5]]);
    });

    it("should filter by an existential whose witnesses come from different conjuncts", () => {
      const [a, b] = [varExp("a"), varExp("b")];
      const chain = new MapEnvironment().defineRelation(
        "e",
        pairs([
          [1, 2],
          [2, 3],
          [3, 4],
          [4, 5],
        ])
      );
      const e = andExp(
        elemExp(x, nums(1, 2, 5)),
        existsExp(["a", "b"], andExp(elemExp(tupleExp(x, a), varExp("e")), elemExp(tupleExp(b, x), varExp("e"))))
      );
      const solved = solve(e, ["x"], { env: chain });
      expect(solved.strategy).toBe("generator");
      expect(solved.rows).toEqual([2]);
    });

    it("should fail without a domain for an unbound variable", () => {
      const e = andExp(elemExp(x, nums(1, 2)), cmpExp(">", y, x));
      expect(() => solve(e, ["x", "y"], { env })).toThrow("No domain supplied for y");
    });
  });

  describe("exhaustive fallback", () => {
    it("should filter the supplied domains by the predicate", () => {
      const solved = solve(cmpExp(">", x, litExp(1)), ["x"], {
        env: new MapEnvironment(),
        domains: { x: [0, 1, 2, 3] },
      });
      expect(solved.strategy).toBe("exhaustive");
      expect(solved.rows).toEqual([2, 3]);
      expect(solved.failure).toEqual({ kind: "UnsupportedShape", message: "x > 1 is only usable as a filter" });
      expect(solved.logs).toContain(
        "[Solve] falling back to exhaustive enumeration: x > 1 is only usable as a filter"
      );
      expect(solved.logs).toContain("[Solve] 2 rows (exhaustive)");
    });

    it("should raise NO_DOMAIN when a goal variable has no domain", () => {
      let code: string | undefined;
      try {
        solve(cmpExp(">", x, litExp(1)), ["x"], { env: new MapEnvironment() });
      } catch (error) {
        if (!(error instanceof EvaluationError)) throw error;
        code = error.code;
      }
      expect(code).toBe("NO_DOMAIN");
    });

    it("should evaluate a recursive predicate over an unbounded base", () => {
      const env = new MapEnvironment()
        .defineExtent("nodes", pairs([[1, 2]]))
        .defineRelation("edges", pairs([[0, 1]]))
        .defineFunction(reachability("reach", "nodes", "edges"));
      const solved = solve(applyExp("reach", x, y), ["x", "y"], {
        env,
        domains: { x: [0, 1], y: [2] },
      });
      expect(solved.strategy).toBe("exhaustive");
      expect(solved.failure?.kind).toBe("UnboundedBase");
      expect(solved.rows).toEqual([
        [0, 2],
        [1, 2],
      ]);
    });

    it("should terminate on a cyclic relation when the closure cannot be tabled", () => {
      const env = new MapEnvironment()
        .defineExtent("nodes", pairs([[5, 6]]))
        .defineRelation(
          "edges",
          pairs([
            [0, 1],
            [1, 0],
          ])
        )
        .defineFunction(reachability("reach", "nodes", "edges"));
      const solved = solve(applyExp("reach", x, y), ["x", "y"], {
        env,
        domains: { x: [0, 5], y: [6] },
      });
      expect(solved.strategy).toBe("exhaustive");
      expect(solved.rows).toEqual([[5, 6]]);
    });

    it("should fall back when the only generator is infinite", () => {
      const env = new MapEnvironment().defineExtent("ints", [1, 2, 3]);
      const solved = solve(elemExp(x, varExp("ints")), ["x"], { env, domains: { x: [2, 5] } });
      expect(solved.strategy).toBe("exhaustive");
      expect(solved.failure?.message).toBe("only an infinite generator was found");
      expect(solved.rows).toEqual([2]);
    });
  });
});
