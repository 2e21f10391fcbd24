import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RelationStore, parseValue } from "../../src/persistence/relation-store.js";
import { MapEnvironment } from "../../src/env/environment.js";

describe("RelationStore", () => {
  let store: RelationStore;

  beforeEach(() => {
    store = new RelationStore();
  });

  afterEach(() => {
    store.close();
  });

  describe("initialization", () => {
    it("should create an in-memory database", () => {
      expect(store.isOpen()).toBe(true);
      expect(store.relationNames()).toEqual([]);
    });
  });

  describe("relations", () => {
    it("should define an empty relation once", () => {
      store.define("edges");
      store.define("edges");
      expect(store.hasRelation("edges")).toBe(true);
      expect(store.rows("edges")).toEqual([]);
    });

    it("should return rows in insertion order across inserts", () => {
      expect(store.insert("edges", [[1, 2], [2, 3]])).toBe(2);
      store.insert("edges", [[3, 4]]);
      expect(store.rows("edges")).toEqual([
        [1, 2],
        [2, 3],
        [3, 4],
      ]);
    });

    it("should round-trip records, strings and null", () => {
      store.insert("people", [{ name: "ann", manager: null }, "solo"]);
      expect(store.rows("people")).toEqual([{ name: "ann", manager: null }, "solo"]);
    });

    it("should list relation names in sorted order", () => {
      store.insert("zeta", [1]);
      store.insert("alpha", [2]);
      expect(store.relationNames()).toEqual(["alpha", "zeta"]);
    });

    it("should reject an unknown relation", () => {
      expect(() => store.rows("missing")).toThrow("Unknown relation: missing");
    });

    it("should drop a relation with its rows", () => {
      store.insert("edges", [[1, 2]]);
      store.drop("edges");
      expect(store.hasRelation("edges")).toBe(false);
      store.define("edges");
      expect(store.rows("edges")).toEqual([]);
    });
  });

  describe("environment binding", () => {
    it("should define every stored relation", () => {
      store.insert("edges", [[1, 2]]);
      store.insert("nodes", [1, 2]);
      const env = store.bindInto(new MapEnvironment());
      expect(env.lookup("edges")).toEqual({ tag: "relation", name: "edges", rows: [[1, 2]] });
      expect(env.lookup("nodes")).toEqual({ tag: "relation", name: "nodes", rows: [1, 2] });
    });
  });

  describe("closing", () => {
    it("should refuse writes after close", () => {
      store.close();
      expect(store.isOpen()).toBe(false);
      expect(() => store.insert("edges", [1])).toThrow("Relation store is closed");
      expect(store.relationNames()).toEqual([]);
      expect(store.hasRelation("edges")).toBe(false);
    });
  });
});

describe("parseValue", () => {
  it("should accept nested JSON values", () => {
    expect(parseValue([1, ["a", true], { k: null }])).toEqual([1, ["a", true], { k: null }]);
  });

  it("should reject values JSON cannot carry", () => {
    expect(() => parseValue(undefined)).toThrow("Not a storable value: undefined");
    expect(() => parseValue(Number.NaN)).toThrow("Not a storable number: NaN");
  });
});
