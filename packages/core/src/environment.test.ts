/**
 * Tests for the Skein environment: scopes, VarSets and named paths.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Environment } from "./environment.js";
import { INT, STRING, mapOf, recordOf } from "./types.js";
import { makeMap, makeRecord } from "./values.js";
import { InterpreterError, ScopeViolationError } from "./errors.js";

describe("Skein Environment", () => {
  describe("scopes", () => {
    it("shadows outer variables in a block", () => {
      const env = new Environment("app");
      env.declare(env.global, "x", INT, 1n);
      const block = env.child(env.global, "block");
      env.declare(block, "x", INT, 2n);
      assert.equal(block.lookup("x")?.value, 2n);
      assert.equal(env.global.lookup("x")?.value, 1n);
    });

    it("rejects a duplicate in the same scope", () => {
      const env = new Environment("app");
      env.declare(env.global, "x", INT, 1n);
      assert.throws(() => env.declare(env.global, "x", INT, 2n), {
        code: "E_DUP_DECL",
        message: "Variable 'x' is already declared in this scope.",
      });
    });

    it("hangs function scopes off the global scope", () => {
      const env = new Environment("app");
      const block = env.child(env.global, "block");
      env.declare(block, "hidden", INT, 1n);
      const fn = env.child(block, "function");
      assert.equal(fn.parent, env.global);
      assert.equal(fn.lookup("hidden"), undefined);
    });

    it("converts on assignment", () => {
      const env = new Environment("app");
      const v = env.declare(env.global, "n", INT, 0n);
      env.assign(v, "30", "script");
      assert.equal(v.value, 30n);
    });

    it("rejects writes to constants", () => {
      const env = new Environment("app");
      const k = env.declare(env.global, "k", INT, 1n, { constant: true });
      assert.throws(() => env.assign(k, 2n, "script"), (err: unknown) => {
        assert.ok(err instanceof InterpreterError);
        assert.equal(err.code, "E_CONST");
        assert.equal(err.message, "Cannot assign to constant 'k'.");
        return true;
      });
    });
  });

  describe("varsets", () => {
    function setup(): Environment {
      const env = new Environment("app");
      const inputs = env.defineVarSet("Inputs", "in");
      env.declare(env.global, "age", INT, 0n, { varSet: inputs });
      const results = env.defineVarSet("Results", "out");
      env.declare(env.global, "total", INT, 0n, { varSet: results });
      const hidden = env.defineVarSet("Cache", "internal");
      env.declare(env.global, "hits", INT, 0n, { varSet: hidden });
      env.declare(env.global, "plain", STRING, "x");
      return env;
    }

    it("rejects a duplicate varset", () => {
      const env = setup();
      assert.throws(() => env.defineVarSet("Inputs", "out"), { message: "VarSet 'Inputs' is already declared." });
    });

    it("lets the host set 'in' variables before the script starts", () => {
      const env = setup();
      env.setPath("app.Inputs.age", "30", "host");
      assert.equal(env.getPath("app.Inputs.age"), 30n);
    });

    it("keeps 'in' variables read-only once started", () => {
      const env = setup();
      env.started = true;
      const age = env.global.lookup("age");
      assert.ok(age);
      assert.throws(() => env.assign(age, 1n, "script"), (err: unknown) => {
        assert.ok(err instanceof ScopeViolationError);
        assert.equal(err.message, "Variable 'age' in 'in' varset 'Inputs' is read-only to the script.");
        assert.deepEqual(err.details, { varSet: "Inputs", scope: "in", variable: "age" });
        return true;
      });
      assert.throws(() => env.setPath("app.Inputs.age", 5n, "host"), {
        code: "E_SCOPE",
        message: "Variable 'age' in 'in' varset 'Inputs' can only be set before the script starts.",
      });
    });

    it("keeps 'out' variables read-only to the host", () => {
      const env = setup();
      env.started = true;
      assert.throws(() => env.setPath("app.Results.total", 5n, "host"), {
        message: "Variable 'total' in 'out' varset 'Results' is read-only to the host.",
      });
      env.setPath("app.Results.total", 5n, "script");
      assert.equal(env.getPath("app.Results.total"), 5n);
    });

    it("lists only host-visible varsets", () => {
      const env = setup();
      assert.deepEqual(env.listVarSets().map((s) => s.name), ["Inputs", "Results"]);
      assert.deepEqual(env.snapshot(), { Inputs: { age: 0 }, Results: { total: 0 } });
    });

    it("still addresses internal varsets by path", () => {
      const env = setup();
      assert.equal(env.getPath("app.Cache.hits"), 0n);
      assert.equal(env.getPath("app.globals.plain"), "x");
    });
  });

  describe("named paths", () => {
    const person = recordOf([
      ["name", STRING],
      ["address", recordOf([["zip", STRING]])],
    ]);

    function setup(): Environment {
      const env = new Environment("app");
      const data = env.defineVarSet("Data", "inout");
      env.declare(env.global, "person", person, env.types.convert(person, makeRecord([["name", "Ann"]])), { varSet: data });
      return env;
    }

    it("reports malformed paths", () => {
      const env = setup();
      const cases: Array<[string, string]> = [
        ["app.Data", "Invalid variable path 'app.Data': expected 'container.varSet.variable'."],
        ["app..person", "Invalid variable path 'app..person': expected 'container.varSet.variable'."],
        ["other.Data.person", "Invalid variable path 'other.Data.person': unknown container 'other'."],
        ["app.Nope.person", "Invalid variable path 'app.Nope.person': unknown varset 'Nope'."],
        ["app.Data.zzz", "Invalid variable path 'app.Data.zzz': varset 'Data' has no variable 'zzz'."],
        ["app.Data.person.age", "Invalid variable path 'app.Data.person.age': no field 'age'."],
        ["app.Data.person.name.x", "Invalid variable path 'app.Data.person.name.x': cannot access 'x' on a scalar."],
      ];
      for (const [path, message] of cases) {
        assert.throws(() => env.getPath(path), { code: "E_PATH", message }, path);
      }
    });

    it("reads nested fields", () => {
      const env = setup();
      assert.equal(env.getPath("app.Data.person.name"), "Ann");
      assert.equal(env.getPath("app.Data.person.address.zip"), "");
    });

    it("writes nested fields through the declared type", () => {
      const env = setup();
      env.setPath("app.Data.person.address.zip", 151n, "host");
      assert.equal(env.getPath("app.Data.person.address.zip"), "151");
    });

    it("returns copies", () => {
      const env = setup();
      const copy = env.getPath("app.Data.person");
      assert.ok(copy !== null && typeof copy === "object" && copy.kind === "record");
      copy.fields.set("name", "Bob");
      assert.equal(env.getPath("app.Data.person.name"), "Ann");
    });

    it("converts map segments to the key type", () => {
      const env = new Environment("app");
      const data = env.defineVarSet("Data", "inout");
      env.declare(env.global, "m", mapOf(INT, STRING), makeMap([[1n, "one"]], INT, STRING), { varSet: data });
      assert.equal(env.getPath("app.Data.m.1"), "one");
      env.setPath("app.Data.m.2", "two", "host");
      assert.equal(env.getPath("app.Data.m.2"), "two");
      assert.throws(() => env.getPath("app.Data.m.x"), {
        code: "E_PATH",
        message: "Invalid variable path 'app.Data.m.x': 'x' is not a valid key.",
      });
      assert.throws(() => env.getPath("app.Data.m.3"), {
        code: "E_PATH",
        message: "Invalid variable path 'app.Data.m.3': no key '3'.",
      });
    });

    it("rejects nested writes that break the type", () => {
      const env = setup();
      assert.throws(() => env.setPath("app.Data.person.address", "nope", "host"), {
        code: "E_TYPE",
        message: "address: expected record{zip: string}, got string",
      });
      assert.equal(env.getPath("app.Data.person.address.zip"), "");
    });
  });
});
