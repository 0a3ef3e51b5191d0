import { writeFile } from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import {
  createOutputWriteError,
  describeError,
  isReqdeckError,
  normalizeBody,
  PathHelper,
  renderBody,
  type ExecuteOptions,
  type HeaderMap,
  type HistoryStore,
  type PreparedRequest,
  type ReqdeckErrorCode,
  type RequestDescriptor,
  type ResponseRecord,
  type VariableStore,
} from "@reqdeck/shared";
import { HistoryRepository, LibraryRepository } from "@reqdeck/db";
import type { ReqdeckConfig } from "../../config/ConfigLoader.js";
import { RunLogger, type RunLogEventType } from "../../logging/RunLogger.js";
import { AssertionEvaluator, type AssertionOutcome } from "../assertions/AssertionEvaluator.js";
import { LocalScriptRunner, type ScriptRunner } from "../assertions/ScriptRunner.js";
import { FetchTransport } from "../transport/FetchTransport.js";
import { createMockResponse } from "../transport/MockResponder.js";
import type { Transport, TransportResponse } from "../transport/Transport.js";
import { authHeadersFor, mergeAuthHeaders } from "./AuthSynthesizer.js";
import type { ExecutionFailure, ExecutionReporter, FailureStage, Prompter } from "./ExecutionReporter.js";
import { PlaceholderResolver, type UnknownVariableResolver } from "./PlaceholderResolver.js";
import { formatResponseReport } from "./ResponseReport.js";
import { expandTargets } from "./TargetExpander.js";

/** Process-level settings that change what some options mean. Never read from globals. */
export interface ExecutionContext {
  debug: boolean;
  /** Write variables answered at a prompt back to the variable store. */
  persistPrompted?: boolean;
}

export interface RequestExecutorDeps {
  variables: VariableStore;
  history: HistoryStore;
  transport: Transport;
  prompter: Prompter;
  reporter: ExecutionReporter;
  scripts?: ScriptRunner;
  logger?: RunLogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface ExecutionSummary {
  records: ResponseRecord[];
  failures: ExecutionFailure[];
  assertions: AssertionOutcome[];
  dispatched: number;
  dryRuns: number;
  cancelled: number;
}

export interface RequestExecutorCreateOptions {
  config: ReqdeckConfig;
  prompter: Prompter;
  reporter: ExecutionReporter;
  persistPrompted?: boolean;
}

interface ResolvedRequest extends PreparedRequest {
  auth?: string;
}

interface IterationState {
  target: string;
  iteration: number;
  summary: ExecutionSummary;
}

const STAGE_CODES: Record<FailureStage, ReqdeckErrorCode> = {
  auth: "malformed_auth",
  transport: "transport_error",
  output: "output_write_error",
  history: "history_io_error",
  assertion: "invalid_assertion",
};

const debugOnlyOptions = (options: ExecuteOptions): string[] => {
  const names: string[] = [];
  if ((options.repeat ?? 1) > 1) names.push("repeat");
  if (options.intervalMs) names.push("interval");
  if (options.mock) names.push("mock");
  if (options.dryRun && !options.preview) names.push("dry-run");
  if (options.skipHistory) names.push("no-history");
  if (options.verbose) names.push("verbose");
  return names;
};

const defaultSleep = (ms: number): Promise<void> => delay(ms).then(() => undefined);

export class RequestExecutor {
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly assertions: AssertionEvaluator;
  private closers: Array<() => Promise<void>> = [];
  private runLogDisabled = false;

  constructor(
    private readonly deps: RequestExecutorDeps,
    private readonly context: ExecutionContext,
  ) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
    this.now = deps.now ?? (() => performance.now());
    this.assertions = new AssertionEvaluator(deps.scripts);
  }

  /** Wires the sqlite stores, fetch transport, local scripts and optional run log from config. */
  static async create(options: RequestExecutorCreateOptions): Promise<RequestExecutor> {
    const { config } = options;
    const library = await LibraryRepository.create(config.dataDir);
    const history = await HistoryRepository.create(config.dataDir);
    const scripts = new LocalScriptRunner({
      scriptsDir: PathHelper.getScriptsDir(config.dataDir),
      command: config.scripts.command,
      extension: config.scripts.extension,
    });
    scripts.ensureStubs();
    const executor = new RequestExecutor(
      {
        variables: library,
        history,
        transport: new FetchTransport({ timeoutMs: config.timeoutMs }),
        prompter: options.prompter,
        reporter: options.reporter,
        scripts,
        logger: config.logging.runLogs ? new RunLogger(PathHelper.getLogsDir(config.dataDir)) : undefined,
      },
      { debug: config.debug, persistPrompted: options.persistPrompted },
    );
    executor.closers = [() => library.close(), () => history.close()];
    return executor;
  }

  async close(): Promise<void> {
    for (const close of this.closers) {
      await close();
    }
    this.closers = [];
  }

  /**
   * Sends `descriptor` to every target it expands to, `repeat` times each.
   *
   * In strict mode every target is resolved before the first dispatch, so a missing variable
   * rejects the call with nothing sent or recorded. Every other failure is reported and ends
   * only its own iteration.
   */
  async execute(descriptor: RequestDescriptor, options: ExecuteOptions = {}): Promise<ExecutionSummary> {
    const { debug } = this.context;
    const summary: ExecutionSummary = { records: [], failures: [], assertions: [], dispatched: 0, dryRuns: 0, cancelled: 0 };
    const variables = await this.deps.variables.load();
    const resolver = new PlaceholderResolver(variables, options.fillVariables ? this.promptForVariable() : undefined);
    const targets = await expandTargets(descriptor.url);

    const ignored = debug ? [] : debugOnlyOptions(options);
    if (ignored.length > 0) {
      this.deps.reporter.notice(`Debug-only options ignored outside debug mode: ${ignored.join(", ")}.`);
    }
    const repeat = debug ? options.repeat ?? 1 : 1;
    const intervalMs = debug ? options.intervalMs ?? 0 : 0;

    const upfront = new Map<string, ResolvedRequest>();
    if (!resolver.interactive) {
      for (const target of targets) {
        upfront.set(target, await this.resolve(descriptor, target, options, resolver));
      }
    }

    for (const target of targets) {
      for (let iteration = 1; iteration <= repeat; iteration += 1) {
        const resolved = upfront.get(target) ?? (await this.resolve(descriptor, target, options, resolver));
        await this.runIteration(resolved, options, { target, iteration, summary });
        if (iteration < repeat && intervalMs > 0) {
          await this.sleep(intervalMs);
        }
      }
    }
    return summary;
  }

  private promptForVariable(): UnknownVariableResolver {
    return async (name, field) => {
      const value = await this.deps.prompter.ask(`Enter value for '${name}' (used in ${field}): `);
      if (this.context.persistPrompted) {
        await this.deps.variables.setVariable(name, value);
      }
      return value;
    };
  }

  private async resolve(
    descriptor: RequestDescriptor,
    target: string,
    options: ExecuteOptions,
    resolver: PlaceholderResolver,
  ): Promise<ResolvedRequest> {
    const method = (await resolver.resolveString(descriptor.method, "method")).toUpperCase();
    const url = await resolver.resolveString(target, "url");
    const headers = await resolver.resolveHeaders(descriptor.headers ?? {});
    const rawBody = normalizeBody(descriptor.body);
    const body = rawBody === undefined ? undefined : await resolver.resolveValue(rawBody, "body");
    const authSource = options.authOverride ?? descriptor.auth;
    const auth = authSource === undefined ? undefined : await resolver.resolveString(authSource, "auth");
    const resolved: ResolvedRequest = { method, url, headers };
    if (body !== undefined) resolved.body = body;
    if (auth !== undefined) resolved.auth = auth;
    return resolved;
  }

  private async runIteration(resolved: ResolvedRequest, options: ExecuteOptions, state: IterationState): Promise<void> {
    const { debug } = this.context;
    const { reporter } = this.deps;

    let authHeaders: HeaderMap;
    try {
      authHeaders = authHeadersFor(resolved.auth);
    } catch (error) {
      await this.fail("auth", error, state);
      return;
    }
    const request: PreparedRequest = {
      method: resolved.method,
      url: resolved.url,
      headers: mergeAuthHeaders(resolved.headers, authHeaders),
    };
    if (resolved.body !== undefined) request.body = resolved.body;

    if (options.preview || (options.dryRun && debug)) {
      reporter.preview(request);
      if (options.dryRun) {
        reporter.dryRun(request);
        state.summary.dryRuns += 1;
        await this.log("dry_run", { method: request.method, url: request.url, iteration: state.iteration });
        return;
      }
      if (!(await this.deps.prompter.confirm("Send this request? (y/N): "))) {
        reporter.cancelled(request);
        state.summary.cancelled += 1;
        await this.log("cancelled", { method: request.method, url: request.url, iteration: state.iteration });
        return;
      }
    }

    const mocked = Boolean(options.mock && debug);
    await this.log("dispatch", { method: request.method, url: request.url, iteration: state.iteration, mocked });
    let response: TransportResponse;
    let elapsedMs: number;
    try {
      if (mocked) {
        const mock = createMockResponse(this.random);
        response = mock;
        elapsedMs = mock.elapsedMs;
      } else {
        const started = this.now();
        response = await this.deps.transport.send(request);
        elapsedMs = this.now() - started;
      }
    } catch (error) {
      await this.fail("transport", error, state);
      return;
    }
    state.summary.dispatched += 1;

    const record = this.buildRecord(request, response, elapsedMs, options);
    state.summary.records.push(record);
    await this.log("response", { method: record.method, url: record.url, status: record.status, elapsedMs, size: record.size });
    if (options.verbose && debug) {
      reporter.exchange(request, record, mocked);
    }
    reporter.response(record);

    if (options.outputFile) {
      try {
        await writeFile(options.outputFile, formatResponseReport(record), "utf8");
        reporter.outputWritten(options.outputFile);
      } catch (error) {
        await this.fail("output", createOutputWriteError(options.outputFile, error), state);
      }
    }

    if (!(options.skipHistory && debug)) {
      try {
        await this.deps.history.append(record);
      } catch (error) {
        await this.fail("history", error, state);
      }
    }

    if (options.assertion) {
      const outcome = this.assertions.evaluate(options.assertion, record);
      state.summary.assertions.push(outcome);
      reporter.assertion(outcome);
      if (outcome.error) {
        await this.fail("assertion", outcome.error, state, false);
      }
    }
  }

  private buildRecord(
    request: PreparedRequest,
    response: TransportResponse,
    elapsedMs: number,
    options: ExecuteOptions,
  ): ResponseRecord {
    const record: ResponseRecord = {
      method: request.method,
      url: request.url,
      headers: request.headers,
      status: response.status,
      reason: response.reasonPhrase,
      elapsedMs,
      size: response.byteLength,
      timestamp: new Date().toISOString(),
      body: renderBody(response.rawBody),
      responseHeaders: response.headers,
    };
    if (request.body !== undefined) record.requestBody = request.body;
    if (options.outputFile) record.outputFile = options.outputFile;
    if (options.displayFilter) record.displayFilter = options.displayFilter;
    return record;
  }

  private async fail(stage: FailureStage, error: unknown, state: IterationState, report = true): Promise<void> {
    const code = isReqdeckError(error) ? error.code : STAGE_CODES[stage];
    const failure: ExecutionFailure = {
      stage,
      code,
      message: describeError(error),
      target: state.target,
      iteration: state.iteration,
    };
    state.summary.failures.push(failure);
    if (report) {
      this.deps.reporter.failure(failure);
    }
    await this.log("failure", { ...failure });
  }

  /** Run logs are best-effort: the first write failure is reported and logging stops. */
  private async log(type: RunLogEventType, data: Record<string, unknown>): Promise<void> {
    const { logger } = this.deps;
    if (!logger || this.runLogDisabled) return;
    try {
      await logger.log(type, data);
    } catch (error) {
      this.runLogDisabled = true;
      this.deps.reporter.notice(`Run log disabled: could not write ${logger.logPath}: ${describeError(error)}`);
    }
  }
}
