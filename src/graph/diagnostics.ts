/**
 * Build diagnostics
 *
 * Nothing in graph construction aborts a design. Every local recovery is
 * recorded here so callers can tell a sparse graph from a faithful one.
 */

import winston from 'winston';
import { AstNode, sourceLine, tagOf } from '../ast/types';

/**
 * Diagnostic severity levels
 */
export enum DiagnosticSeverity {
  INFO = 'info',       // Expected simplification, graph still faithful
  WARNING = 'warning', // Part of a block rendered partially
}

/**
 * Diagnostic types
 */
export enum DiagnosticType {
  MALFORMED_INPUT = 'malformed_input',
  UNRECOGNIZED_CONSTRUCT = 'unrecognized_construct',
  CLASSIFICATION_AMBIGUITY = 'classification_ambiguity',
}

export interface BuildDiagnostic {
  type: DiagnosticType;
  severity: DiagnosticSeverity;
  message: string;
  tag?: string;
  line?: number;
  /** What the builder did instead */
  recovery: string;
}

export class DiagnosticCollector {
  private readonly entries: BuildDiagnostic[] = [];

  constructor(private readonly logger: winston.Logger) {}

  malformed(node: AstNode, message: string, recovery: string): void {
    this.record(DiagnosticType.MALFORMED_INPUT, DiagnosticSeverity.WARNING, node, message, recovery);
  }

  unrecognized(node: AstNode): void {
    this.record(
      DiagnosticType.UNRECOGNIZED_CONSTRUCT,
      DiagnosticSeverity.INFO,
      node,
      `No rule for <${tagOf(node)}>`,
      'descended into children in document order'
    );
  }

  ambiguous(node: AstNode, label: string): void {
    this.record(
      DiagnosticType.CLASSIFICATION_AMBIGUITY,
      DiagnosticSeverity.INFO,
      node,
      'Block matched no specific heuristic',
      `classified as ${label}`
    );
  }

  list(): BuildDiagnostic[] {
    return [...this.entries];
  }

  private record(
    type: DiagnosticType,
    severity: DiagnosticSeverity,
    node: AstNode,
    message: string,
    recovery: string
  ): void {
    const diagnostic: BuildDiagnostic = { type, severity, message, tag: tagOf(node), recovery };
    const line = sourceLine(node);
    if (line !== undefined) {
      diagnostic.line = line;
    }
    this.entries.push(diagnostic);
    this.logger.debug(message, { type, tag: diagnostic.tag, line, recovery });
  }
}
