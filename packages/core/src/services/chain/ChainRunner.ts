import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import {
  createInvalidInputError,
  describeError,
  isReqdeckError,
  type ExecuteOptions,
  type RequestDescriptor,
} from "@reqdeck/shared";
import { isRecord, parseRequestDescriptor, parseStepOptions } from "../library/DescriptorCodec.js";
import type { ExecutionSummary, RequestExecutor } from "../request/RequestExecutor.js";

export interface ChainStep {
  descriptor: RequestDescriptor;
  options: ExecuteOptions;
}

export interface ChainStepResult {
  step: number;
  descriptor: RequestDescriptor;
  summary?: ExecutionSummary;
  error?: string;
}

export interface ChainRunHooks {
  onStep?: (step: number, descriptor: RequestDescriptor) => void;
}

/** Parses a chain file: a JSON or YAML list of requests with optional per-step options. */
export const parseChain = (content: string, file: string): ChainStep[] => {
  const data: unknown = /\.ya?ml$/i.test(path.extname(file)) ? YAML.parse(content) : JSON.parse(content);
  if (!Array.isArray(data)) {
    throw createInvalidInputError(`Chain file ${file} must contain a list of requests.`);
  }
  return data.map((entry: unknown, index) => {
    const descriptor = parseRequestDescriptor(entry, `chain step ${index + 1}`);
    return { descriptor, options: isRecord(entry) ? parseStepOptions(entry) : {} };
  });
};

export class ChainRunner {
  constructor(private readonly executor: RequestExecutor) {}

  async load(file: string): Promise<ChainStep[]> {
    let content: string;
    try {
      content = await readFile(file, "utf8");
    } catch (error) {
      throw createInvalidInputError(`Could not read chain file ${file}: ${describeError(error)}`);
    }
    try {
      return parseChain(content, file);
    } catch (error) {
      if (isReqdeckError(error)) throw error;
      throw createInvalidInputError(`Could not parse chain file ${file}: ${describeError(error)}`);
    }
  }

  /**
   * Runs the steps in order. A step that cannot start (for example a missing variable) is
   * recorded and the chain moves on.
   */
  async run(steps: ChainStep[], hooks: ChainRunHooks = {}): Promise<ChainStepResult[]> {
    const results: ChainStepResult[] = [];
    for (const [index, step] of steps.entries()) {
      const number = index + 1;
      hooks.onStep?.(number, step.descriptor);
      try {
        const summary = await this.executor.execute(step.descriptor, step.options);
        results.push({ step: number, descriptor: step.descriptor, summary });
      } catch (error) {
        if (!isReqdeckError(error)) throw error;
        results.push({ step: number, descriptor: step.descriptor, error: error.message });
      }
    }
    return results;
  }
}
