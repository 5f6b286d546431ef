export type ErrorCode =
  | 'PARSE_ERROR'
  | 'SCHEMA_ERROR'
  | 'VALIDATION_ERROR'
  | 'STRUCTURAL_INTEGRITY'
  | 'UNSUPPORTED_ACTION'
  | 'NOT_FOUND'
  | 'ENRICHMENT_ERROR'
  | 'VERSION_CONFLICT'
  | 'SEMANTIC_DRIFT';

export interface IssuePath {
  path: string;
  message: string;
}

export class DiagramEngineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'DiagramEngineError';
    this.code = code;
  }
}

/** Malformed SVG/XML. Not retried. */
export class ParseError extends DiagramEngineError {
  constructor(message: string) {
    super('PARSE_ERROR', message);
    this.name = 'ParseError';
  }
}

export class SchemaError extends DiagramEngineError {
  readonly issues: IssuePath[];

  constructor(issues: IssuePath[], context = 'IR validation failed') {
    super('SCHEMA_ERROR', `${context}: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

export class ValidationError extends DiagramEngineError {
  readonly issues: IssuePath[];

  constructor(message: string, issues: IssuePath[] = []) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export interface OrphanedEdge {
  edge_id: string;
  missing: string[];
}

/** A patch would leave an edge pointing at a block that no longer exists. */
export class StructuralIntegrityError extends DiagramEngineError {
  readonly orphans: OrphanedEdge[];

  constructor(orphans: OrphanedEdge[]) {
    super(
      'STRUCTURAL_INTEGRITY',
      `Patch would orphan ${orphans.length} edge(s): ${orphans.map((o) => o.edge_id).join(', ')}`
    );
    this.name = 'StructuralIntegrityError';
    this.orphans = orphans;
  }
}

export class UnsupportedActionError extends DiagramEngineError {
  readonly action: string;

  constructor(action: string) {
    super('UNSUPPORTED_ACTION', `Unsupported feedback action '${action}'`);
    this.name = 'UnsupportedActionError';
    this.action = action;
  }
}

export class NotFoundError extends DiagramEngineError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** The enriched document failed its own schema: a bug in the enrichment rules. */
export class EnrichmentError extends DiagramEngineError {
  readonly issues: IssuePath[];

  constructor(issues: IssuePath[]) {
    super('ENRICHMENT_ERROR', issues.map((i) => `${i.path}: ${i.message}`).join('; '));
    this.name = 'EnrichmentError';
    this.issues = issues;
  }
}

export class VersionConflictError extends DiagramEngineError {
  constructor(message: string) {
    super('VERSION_CONFLICT', message);
    this.name = 'VersionConflictError';
  }
}

export class SemanticDriftError extends DiagramEngineError {
  readonly summary: string;

  constructor(summary: string) {
    super('SEMANTIC_DRIFT', summary);
    this.name = 'SemanticDriftError';
    this.summary = summary;
  }
}

export function issuesFromZod(error: { issues: ReadonlyArray<{ path: ReadonlyArray<string | number>; message: string }> }): IssuePath[] {
  return error.issues.map((issue) => ({
    path: issue.path.length ? issue.path.join('/') : '<root>',
    message: issue.message
  }));
}
