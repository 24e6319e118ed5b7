/**
 * Type definitions for GraphBuilder
 * Core interfaces and types used across builder modules
 */

export interface GraphBuilderOptions {
  /** Case-insensitive name tokens (e.g. `clk` in `sys_clk`) of signals that are never wired */
  ignoredSignals?: string[];
  /** Operator count above which an unclocked block is a datapath */
  datapathOpThreshold?: number;
  /** HDL source, one entry per line, used to attach source text to statement nodes */
  sourceLines?: readonly string[];
}

export interface ResolvedBuilderOptions {
  ignoredSignals: string[];
  datapathOpThreshold: number;
  sourceLines?: readonly string[];
}

/** Role a node plays for one signal */
export type SignalDirection = 'driver' | 'receiver' | 'inout';

export interface SignalBinding {
  nodeId: number;
  direction: SignalDirection;
}

/** One architecture-level edge; several signals on one node pair form a bus */
export interface ResolvedConnection {
  src: number;
  dst: number;
  signals: string[];
}

export interface BlockAccesses {
  reads: string[];
  writes: string[];
}
