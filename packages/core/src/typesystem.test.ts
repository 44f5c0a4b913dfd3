/**
 * Tests for the Skein type system.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { TypeSystem } from "./typesystem.js";
import type { DataType } from "./types.js";
import { BOOL, DOUBLE, INT, STRING, TypeRegistry, arrayOf, describeType, mapOf, named, queueOf, recordOf } from "./types.js";
import type { Value } from "./values.js";
import { formatValue, makeArray, makeMap, makeQueue, makeRecord } from "./values.js";
import { TypeCheckError } from "./errors.js";

function convertError(ts: TypeSystem, type: DataType, value: Value): TypeCheckError {
  try {
    ts.convert(type, value);
  } catch (e) {
    if (e instanceof TypeCheckError) return e;
    throw e;
  }
  assert.fail("expected a TypeCheckError");
}

describe("TypeSystem", () => {
  const ts = new TypeSystem();

  describe("scalar coercion", () => {
    it("converts strings and doubles to int", () => {
      assert.equal(ts.convert(INT, "30"), 30n);
      assert.equal(ts.convert(INT, " -7 "), -7n);
      assert.equal(ts.convert(INT, 3.9), 3n);
      assert.equal(ts.convert(INT, -3.9), -3n);
      assert.equal(ts.convert(INT, null), 0n);
    });

    it("rejects text that is not an int", () => {
      const err = convertError(ts, INT, "abc");
      assert.equal(err.message, 'cannot convert "abc" to int');
      assert.equal(err.path, "");
      assert.equal(convertError(ts, INT, "9223372036854775808").message, 'cannot convert "9223372036854775808" to int');
    });

    it("converts to double", () => {
      assert.equal(ts.convert(DOUBLE, 5n), 5);
      assert.equal(ts.convert(DOUBLE, "2.5e1"), 25);
      assert.equal(convertError(ts, DOUBLE, true).message, "expected double, got bool");
    });

    it("converts to string", () => {
      assert.equal(ts.convert(STRING, 30), "30.0");
      assert.equal(ts.convert(STRING, 30n), "30");
      assert.equal(ts.convert(STRING, false), "false");
      assert.equal(ts.convert(STRING, null), "");
    });

    it("converts to bool", () => {
      assert.equal(ts.convert(BOOL, "TRUE"), true);
      assert.equal(ts.convert(BOOL, " false "), false);
      assert.equal(convertError(ts, BOOL, "yes").message, 'cannot convert "yes" to bool');
      assert.equal(convertError(ts, BOOL, 1n).message, "expected bool, got int");
    });
  });

  describe("records", () => {
    const person = recordOf([
      ["name", STRING],
      ["age", INT],
    ]);

    it("defaults missing fields", () => {
      const result = ts.convert(person, makeRecord([["age", "42"]]));
      assert.deepEqual(result, makeRecord([
        ["name", ""],
        ["age", 42n],
      ]));
    });

    it("rejects unknown fields", () => {
      const err = convertError(ts, recordOf([["x", INT]]), makeRecord([
        ["x", 1n],
        ["y", 2n],
      ]));
      assert.equal(err.message, "y: unknown field");
      assert.equal(err.path, "y");
    });

    it("validates exact shapes", () => {
      assert.equal(ts.validate(person, makeRecord([["name", "Ann"], ["age", 3n]])), null);
      assert.equal(ts.validate(person, makeRecord([["name", "Ann"]]))?.message, "age: missing field");
    });

    it("names the failing path", () => {
      const nested = recordOf([["address", recordOf([["zip", STRING]])]]);
      const bad = makeRecord([["address", makeRecord([["zip", 150n]])]]);
      assert.equal(ts.validate(nested, bad)?.message, "address.zip: expected string, got int");

      const listType = recordOf([["items", arrayOf(recordOf([["id", INT]]))]]);
      const items = makeArray([
        makeRecord([["id", 1n]]),
        makeRecord([["id", "2"]]),
        makeRecord([["id", "x"]]),
      ]);
      const err = convertError(ts, listType, makeRecord([["items", items]]));
      assert.equal(err.message, 'items[2].id: cannot convert "x" to int');
      assert.equal(err.path, "items[2].id");
    });

    it("accepts null for composite types", () => {
      assert.equal(ts.validate(person, null), null);
      assert.equal(ts.convert(arrayOf(INT), null), null);
      assert.equal(ts.convert(person, null), null);
    });
  });

  describe("arrays, queues and maps", () => {
    it("pads fixed arrays with defaults", () => {
      const result = ts.convert(arrayOf(INT, 3), makeArray(["1"]));
      assert.deepEqual(result, makeArray([1n, 0n, 0n], INT, 3));
    });

    it("rejects arrays over capacity", () => {
      assert.equal(
        convertError(ts, arrayOf(INT, 2), makeArray([1n, 2n, 3n])).message,
        "expected at most 2 elements, got 3"
      );
      assert.equal(
        ts.validate(arrayOf(INT, 2), makeArray([1n, 2n, 3n], INT, null))?.message,
        "expected at most 2 elements, got 3"
      );
    });

    it("builds maps from records", () => {
      const result = ts.convert(mapOf(STRING, INT), makeRecord([
        ["a", "1"],
        ["b", 2n],
      ]));
      assert.deepEqual(result, makeMap([
        ["a", 1n],
        ["b", 2n],
      ], STRING, INT));
    });

    it("converts arrays to queues", () => {
      assert.deepEqual(ts.convert(queueOf(STRING), makeArray([1n, true])), makeQueue(["1", "true"], STRING));
    });

    it("builds default values", () => {
      const grid = ts.defaultValue(arrayOf(arrayOf(INT, 3), 2));
      assert.equal(formatValue(grid), "[[0, 0, 0], [0, 0, 0]]");
      assert.equal(formatValue(ts.defaultValue(recordOf([["ok", BOOL], ["ratio", DOUBLE]]))), '{"ok": false, "ratio": 0.0}');
      assert.equal(formatValue(ts.defaultValue(queueOf(INT))), "[]");
    });
  });

  describe("named types", () => {
    it("tags converted records with their type name", () => {
      const registry = new TypeRegistry();
      registry.define("Point", recordOf([
        ["x", INT],
        ["y", INT],
      ]));
      const typed = new TypeSystem(registry);
      const result = typed.convert(named("Point"), makeRecord([["x", "1"]]));
      assert.deepEqual(result, makeRecord([
        ["x", 1n],
        ["y", 0n],
      ], "Point"));
      assert.equal(typed.validate(named("Point"), "p")?.message, "expected Point, got string");
    });

    it("rejects duplicate definitions", () => {
      const registry = new TypeRegistry();
      registry.define("A", INT);
      assert.throws(() => registry.define("A", STRING), { message: "type 'A' is already defined" });
    });

    it("detects cycles and leaves the registry unchanged", () => {
      const registry = new TypeRegistry();
      registry.define("A", recordOf([["b", named("B")]]));
      assert.throws(
        () => registry.define("B", recordOf([["a", arrayOf(named("A"))]])),
        (err: unknown) => {
          assert.ok(err instanceof TypeCheckError);
          assert.equal(err.code, "E_TYPE_CYCLE");
          assert.equal(err.message, "cyclic type definition: B -> A -> B");
          return true;
        }
      );
      assert.equal(registry.has("B"), false);
      assert.deepEqual(registry.names(), ["A"]);
    });
  });

  it("describes types in source syntax", () => {
    assert.equal(describeType(arrayOf(arrayOf(INT, 4), 3)), "int[3][4]");
    assert.equal(describeType(mapOf(STRING, queueOf(DOUBLE))), "map<string, queue<double>>");
    assert.equal(describeType(recordOf([["id", INT], ["tags", arrayOf(STRING)]])), "record{id: int, tags: string[]}");
  });

  describe("random nested records", () => {
    for (let seed = 1; seed <= 70; seed++) {
      const depth = seed % 7;
      it(`validates and converts record #${seed} (depth ${depth})`, () => {
        const random = mulberry32(seed);
        const gen = new ValueGenerator(random);
        const type = gen.recordType(depth);
        const value = gen.valueOf(type);

        assert.equal(ts.validate(type, value), null);
        const once = ts.convert(type, value);
        assert.equal(ts.validate(type, once), null);
        assert.deepEqual(ts.convert(type, once), once);
      });
    }
  });
});

function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const SCALARS: DataType[] = [INT, DOUBLE, STRING, BOOL];

class ValueGenerator {
  constructor(private readonly random: () => number) {}

  private int(n: number): number {
    return Math.floor(this.random() * n);
  }

  recordType(depth: number): DataType {
    const count = 1 + this.int(4);
    const fields: Array<[string, DataType]> = [];
    for (let i = 0; i < count; i++) {
      fields.push([`f${i}`, this.fieldType(depth)]);
    }
    // Guarantee the requested nesting depth on the first field.
    if (depth > 0) fields[0] = ["f0", this.recordType(depth - 1)];
    return recordOf(fields);
  }

  private fieldType(depth: number): DataType {
    const roll = this.int(depth > 0 ? 6 : 4);
    switch (roll) {
      case 0:
        return arrayOf(SCALARS[this.int(SCALARS.length)], this.random() < 0.5 ? null : 1 + this.int(3));
      case 1:
        return queueOf(SCALARS[this.int(SCALARS.length)]);
      case 2:
        return mapOf(STRING, SCALARS[this.int(SCALARS.length)]);
      case 4:
        return this.recordType(depth - 1);
      case 5:
        return arrayOf(this.recordType(depth - 1));
      default:
        return SCALARS[this.int(SCALARS.length)];
    }
  }

  valueOf(type: DataType): Value {
    switch (type.kind) {
      case "int":
        return BigInt(this.int(2000) - 1000);
      case "double":
        return this.int(400) / 8;
      case "string":
        return `s${this.int(100)}`;
      case "bool":
        return this.random() < 0.5;
      case "array": {
        const max = type.capacity ?? 4;
        const items = Array.from({ length: this.int(max + 1) }, () => this.valueOf(type.element));
        return makeArray(items, type.element, type.capacity);
      }
      case "queue":
        return makeQueue(Array.from({ length: this.int(3) }, () => this.valueOf(type.element)), type.element);
      case "map":
        return makeMap(
          Array.from({ length: this.int(3) }, (_, i): [string, Value] => [`k${i}`, this.valueOf(type.value)]),
          type.key,
          type.value
        );
      case "record":
        if (this.random() < 0.1) return null;
        return makeRecord(type.fields.map((f): [string, Value] => [f.name, this.valueOf(f.type)]));
      default:
        return null;
    }
  }
}
