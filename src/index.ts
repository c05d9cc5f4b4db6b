export * from "./sim";
export {
  type ExecutionPlan,
  type PlanNode,
  type TensorId,
  type TensorInfo,
  type TensorTable,
  tensorEnd,
  tensorTableFromRecord,
} from "./core/tensor-table";
export {
  loadTraceFile,
  parseTraceDocument,
  type TraceDocument,
} from "./trace-file";
