/**
 * ScriptInstance: one Environment, one evaluator and one serial queue.
 *
 * Every operation that touches the Environment (the top-level run, callbacks
 * and host variable access) goes through the queue, so exactly one unit runs
 * at a time.
 */
import { randomUUID } from "node:crypto";
import type * as AST from "./ast.js";
import { BuiltinRegistry } from "./builtins.js";
import { Environment } from "./environment.js";
import { Evaluator } from "./evaluator.js";
import type { Limits, TraceEvent } from "./evaluator.js";
import { InterpreterError } from "./errors.js";
import { SerialQueue } from "./serial-queue.js";
import { TypeSystem } from "./typesystem.js";
import { cloneValue } from "./values.js";
import type { JsonValue, Value } from "./values.js";

export type InstanceState = "idle" | "running" | "ready" | "failed" | "stopped";

export interface ScriptInstanceOptions {
  /** Container name, the first segment of variable paths. Defaults to "main". */
  name?: string;
  builtins?: BuiltinRegistry;
  limits?: Limits;
  trace?: (event: TraceEvent) => void;
  print?: (line: string) => void;
  runId?: string;
  /** Cancels the instance when aborted. */
  signal?: AbortSignal;
}

export interface ExecutionResult {
  value: Value;
  output: string[];
}

export class ScriptInstance {
  readonly name: string;
  readonly runId: string;
  readonly env: Environment;

  private currentState: InstanceState = "idle";
  private started = false;
  private prepared: Promise<void> | null = null;
  private readonly program: AST.Program;
  private readonly queue = new SerialQueue();
  private readonly controller = new AbortController();
  private readonly evaluator: Evaluator;

  constructor(program: AST.Program, options: ScriptInstanceOptions = {}) {
    this.program = program;
    this.name = options.name ?? "main";
    this.runId = options.runId ?? randomUUID();
    this.env = new Environment(this.name, new TypeSystem());
    this.evaluator = new Evaluator({
      env: this.env,
      builtins: options.builtins ?? BuiltinRegistry.empty(),
      runId: this.runId,
      signal: this.controller.signal,
      instanceKey: this,
      limits: options.limits,
      trace: options.trace,
      print: options.print,
      submitCallback: (fn, args) => this.submitCallback(fn, args),
    });

    const external = options.signal;
    if (external) {
      if (external.aborted) this.cancel();
      else external.addEventListener("abort", () => this.cancel(), { once: true });
    }
  }

  get state(): InstanceState {
    return this.currentState;
  }

  /** Printed lines held for the current unit. */
  get bufferedOutput(): number {
    return this.evaluator.bufferedLines;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Apply `bindings` as host writes (path → value), start the instance and
   * execute the top-level statements. May be called once.
   */
  run(bindings: Record<string, Value> = {}): Promise<ExecutionResult> {
    if (this.started) {
      return Promise.reject(new InterpreterError("E_ALREADY_RUN", `Instance '${this.name}' has already been run.`));
    }
    this.started = true;
    return this.queue.enqueue(async () => {
      this.assertLive();
      try {
        await this.ensurePrepared();
        for (const [path, value] of Object.entries(bindings)) {
          this.env.setPath(path, value, "host");
        }
        this.env.started = true;
        this.currentState = "running";
        const value = await this.evaluator.runProgram(this.program);
        this.setState("ready");
        return { value: cloneValue(value), output: this.evaluator.takeOutput() };
      } catch (e) {
        this.evaluator.takeOutput();
        this.setState("failed");
        throw e;
      }
    });
  }

  /**
   * Queue a call to a script function. Rejects with E_NOT_READY unless the
   * top-level run has completed. A failing callback leaves the instance ready.
   *
   * A builtin may submit callbacks but must not await them: they settle only
   * after the unit that submitted them.
   */
  submitCallback(functionName: string, args: Value[] = []): Promise<Value> {
    return this.queue.enqueue(async () => {
      this.assertLive();
      if (this.currentState !== "ready") {
        throw new InterpreterError(
          "E_NOT_READY",
          `Instance '${this.name}' is ${this.currentState}; callbacks run only once it is ready.`,
          undefined,
          { fn: functionName, state: this.currentState }
        );
      }
      try {
        return cloneValue(await this.evaluator.runCallback(functionName, args));
      } finally {
        // Callback output reaches the host only through the print option.
        this.evaluator.takeOutput();
      }
    });
  }

  /** Copy of the value at `container.varSet.var[.field...]`. */
  getVar(path: string): Promise<Value> {
    return this.queue.enqueue(async () => {
      this.assertLive();
      await this.ensurePrepared();
      return this.env.getPath(path);
    });
  }

  /** Host write; converts to the declared type and obeys VarSet scope rules. */
  setVar(path: string, value: Value): Promise<void> {
    return this.queue.enqueue(async () => {
      this.assertLive();
      await this.ensurePrepared();
      this.env.setPath(path, value, "host");
    });
  }

  snapshot(): Promise<Record<string, Record<string, JsonValue>>> {
    return this.queue.enqueue(async () => {
      this.assertLive();
      await this.ensurePrepared();
      return this.env.snapshot();
    });
  }

  /** Abort the running unit at its next check and reject every queued one. */
  cancel(): void {
    this.currentState = "stopped";
    this.controller.abort();
  }

  async dispose(): Promise<void> {
    this.cancel();
    await this.queue.idle();
  }

  private setState(next: InstanceState): void {
    if (this.currentState !== "stopped") this.currentState = next;
  }

  private assertLive(): void {
    if (this.currentState === "stopped") {
      throw new InterpreterError("E_STOPPED", `Instance '${this.name}' is stopped.`);
    }
  }

  private ensurePrepared(): Promise<void> {
    if (!this.prepared) {
      this.prepared = this.evaluator.prepare(this.program);
    }
    return this.prepared;
  }
}

export interface RunOptions extends ScriptInstanceOptions {
  bindings?: Record<string, Value>;
}

/**
 * Create an instance, run it to completion and cancel it afterwards.
 */
export async function run(program: AST.Program, options: RunOptions = {}): Promise<ExecutionResult> {
  const instance = new ScriptInstance(program, options);
  try {
    return await instance.run(options.bindings);
  } finally {
    instance.cancel();
  }
}
