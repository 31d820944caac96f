export { FlowNode } from './flow-node';
export { Node, type NodeConfig } from './node';
export { BatchNode, type BatchNodeConfig } from './batch-node';
export { Flow, describeGraph, type FlowOptions, type RunOptions, type FlowEdge, type FlowDescription, type FlowGraph } from './flow';
export { FlowBuilder } from './flow-builder';
export { detectExecutionMode, type ModeCapabilities, type ModeDetector } from './mode';
export { execPipeline, type ExecStep } from './pipeline';
export type {
  EdgeName,
  NodeEnvironment,
  NodeCacheOptions,
  ExecSettings,
  NodeStats,
  ItemFailure,
  BatchOutcome,
} from './types';
