// file: src/errors.ts

export type ErrorDetails = Record<string, unknown>;

/** Wspólna baza błędów silnika; warstwa HTTP mapuje je na 4xx/5xx. */
export class KnowledgeGraphError extends Error {
  readonly details: ErrorDetails;

  constructor(message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Nie da się połączyć z bazą grafu. Fatalne przy starcie, bez ponawiania. */
export class StoreUnavailableError extends KnowledgeGraphError {}

export class QueryExecutionError extends KnowledgeGraphError {
  readonly planId: string;
  readonly diagnostic: string;

  constructor(planId: string, diagnostic: string, cause?: unknown) {
    super(`Query "${planId}" failed: ${diagnostic}`, { planId }, { cause });
    this.planId = planId;
    this.diagnostic = diagnostic;
  }
}

export class QueryTimeoutError extends KnowledgeGraphError {
  readonly planId: string;
  readonly timeoutMs: number;

  constructor(planId: string, timeoutMs: number) {
    super(`Query "${planId}" exceeded ${timeoutMs} ms`, { planId, timeoutMs });
    this.planId = planId;
    this.timeoutMs = timeoutMs;
  }
}

export type SchemaTokenKind = 'label' | 'relationship' | 'property';

/** Token spoza zamkniętego schematu to błąd programisty. */
export class SchemaViolationError extends KnowledgeGraphError {
  readonly kind: SchemaTokenKind;
  readonly token: string;

  constructor(kind: SchemaTokenKind, token: string) {
    super(`Unknown ${kind} "${token}"`, { kind, token });
    this.kind = kind;
    this.token = token;
  }
}

export class InvalidRequestError extends KnowledgeGraphError {}

export class AmbiguousNameError extends KnowledgeGraphError {
  readonly candidates: string[];

  constructor(name: string, candidates: string[]) {
    super(`Name "${name}" matches several nodes: ${candidates.join(', ')}`, { name, candidates });
    this.candidates = candidates;
  }
}

export function isKnowledgeGraphError(e: unknown): e is KnowledgeGraphError {
  return e instanceof KnowledgeGraphError;
}

/** Skraca tekst diagnostyczny, żeby logi nie rosły razem z zapytaniem. */
export function truncateDiagnostic(text: string, max = 120): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max)}…` : flat;
}
