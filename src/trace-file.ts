import fs from "node:fs";

import type {
  ExecutionPlan,
  PlanNode,
  TensorInfo,
  TensorTable,
} from "./core/tensor-table";
import { TraceFormatError } from "./sim/errors";

/**
 * Loader for the JSON dump produced by the allocation-log parser:
 *
 *   {
 *     "report_data": { "tensors_by_type": { "<kind>": [ { tensor_id, address,
 *       size, data_type, usage_count, used_by_nodes }, ... ] } },
 *     "execution_plan": [ { node_idx, operator, inputs, outputs }, ... ]
 *   }
 *
 * Extra fields are ignored. Missing or mistyped fields raise TraceFormatError.
 */

export interface TraceDocument {
  tensors: TensorTable;
  plan: ExecutionPlan;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function objectAt(value: unknown, path: string): JsonObject {
  if (!isObject(value)) throw new TraceFormatError(path, "expected an object");
  return value;
}

function arrayAt(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) throw new TraceFormatError(path, "expected an array");
  return value;
}

function integerAt(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new TraceFormatError(path, "expected a safe integer");
  }
  return value;
}

function stringAt(value: unknown, path: string): string {
  if (typeof value !== "string") throw new TraceFormatError(path, "expected a string");
  return value;
}

function integerListAt(value: unknown, path: string): number[] {
  return arrayAt(value, path).map((item, i) => integerAt(item, `${path}[${i}]`));
}

function parseTensor(raw: unknown, path: string): [number, TensorInfo] {
  const entry = objectAt(raw, path);
  const id = integerAt(entry.tensor_id, `${path}.tensor_id`);
  const address = integerAt(entry.address, `${path}.address`);
  const size = integerAt(entry.size, `${path}.size`);
  if (address < 0) throw new TraceFormatError(`${path}.address`, "must be non-negative");
  if (size < 0) throw new TraceFormatError(`${path}.size`, "must be non-negative");
  if (address + size > Number.MAX_SAFE_INTEGER) {
    throw new TraceFormatError(path, "address + size exceeds Number.MAX_SAFE_INTEGER");
  }
  return [
    id,
    {
      address,
      size,
      dataType: stringAt(entry.data_type, `${path}.data_type`),
      usageCount: integerAt(entry.usage_count, `${path}.usage_count`),
      usedByNodes: integerListAt(entry.used_by_nodes, `${path}.used_by_nodes`),
    },
  ];
}

function parseNode(raw: unknown, path: string): PlanNode {
  const entry = objectAt(raw, path);
  return {
    nodeIndex: integerAt(entry.node_idx, `${path}.node_idx`),
    operator: stringAt(entry.operator, `${path}.operator`),
    inputs: integerListAt(entry.inputs, `${path}.inputs`),
    outputs: integerListAt(entry.outputs, `${path}.outputs`),
  };
}

/**
 * Convert a parsed JSON dump into a tensor table and execution plan.
 * @throws TraceFormatError naming the first offending path
 */
export function parseTraceDocument(raw: unknown): TraceDocument {
  const root = objectAt(raw, "$");
  const report = objectAt(root.report_data, "$.report_data");
  const byType = objectAt(report.tensors_by_type, "$.report_data.tensors_by_type");

  const tensors = new Map<number, TensorInfo>();
  for (const [kind, list] of Object.entries(byType)) {
    const base = `$.report_data.tensors_by_type.${kind}`;
    arrayAt(list, base).forEach((item, i) => {
      const [id, info] = parseTensor(item, `${base}[${i}]`);
      if (tensors.has(id)) {
        throw new TraceFormatError(`${base}[${i}].tensor_id`, `duplicate tensor id ${id}`);
      }
      tensors.set(id, info);
    });
  }

  const plan = arrayAt(root.execution_plan, "$.execution_plan").map((item, i) =>
    parseNode(item, `$.execution_plan[${i}]`),
  );

  return { tensors, plan };
}

export function loadTraceFile(filePath: string): TraceDocument {
  const text = fs.readFileSync(filePath, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new TraceFormatError(
      "$",
      `${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return parseTraceDocument(raw);
}
