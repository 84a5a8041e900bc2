
export type ProblemKind
  = 'unresolved-symbol'
  | 'unresolved-node-type'
  | 'unresolved-super-type'
  | 'unresolved-grammar'
  | 'inheritance-cycle'
  | 'classification-mismatch'
  | 'empty-cardinality'
  | 'duplicate-node-type'

/**
 * One inconsistency found while checking a grammar against its node types.
 */
export interface Problem {
  readonly kind: ProblemKind;
  /**
   * The name of the rule, node type or grammar that could not be resolved
   * or is inconsistent.
   */
  readonly name: string;
  /**
   * Where the offending name was found, e.g. `grammar.json: rule 'module'`.
   */
  readonly location: string;
  readonly message: string;
}

export function formatProblem(problem: Problem): string {
  return `[${problem.kind}] ${problem.location}: ${problem.message}`;
}

export class ProblemCollector {

  private readonly problems: Problem[] = [];
  private readonly seen = new Set<string>();

  public add(kind: ProblemKind, name: string, location: string, message: string): void {
    const key = `${kind}\0${name}\0${location}`;
    if (this.seen.has(key)) {
      return;
    }
    this.seen.add(key);
    this.problems.push({ kind, name, location, message });
  }

  public getProblems(): readonly Problem[] {
    return [...this.problems];
  }

}
