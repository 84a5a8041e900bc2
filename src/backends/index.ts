
import { UnknownBackendError } from "../errors";
import type { EmissionRequest } from "../emission";
import { compareStrings } from "../util";
import { jsonBackend } from "./json";
import { typescriptBackend } from "./typescript";

/**
 * What a backend should render.
 *
 * - `wrapper`: typed accessors over the nodes of a syntax tree
 * - `constants`: the names of node types and fields
 */
export type Artifact = 'wrapper' | 'constants';

export function isArtifact(value: string): value is Artifact {
  return value === 'wrapper' || value === 'constants';
}

export interface EmissionBackend {
  /**
   * The name that selects this backend, e.g. on the command line.
   */
  readonly language: string;
  readonly fileExtension: string;
  /**
   * @throws {RenderError} when the request cannot be expressed in the
   * target language.
   */
  render(request: EmissionRequest, artifact: Artifact): string;
}

const backends = new Map<string, EmissionBackend>();

export function registerBackend(backend: EmissionBackend): void {
  backends.set(backend.language, backend);
}

export function getBackendNames(): string[] {
  return [...backends.keys()].sort(compareStrings);
}

export function getBackend(language: string): EmissionBackend {
  const backend = backends.get(language);
  if (backend === undefined) {
    throw new UnknownBackendError(language, getBackendNames());
  }
  return backend;
}

registerBackend(typescriptBackend);
registerBackend(jsonBackend);
