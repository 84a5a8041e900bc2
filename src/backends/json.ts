
import type { EmissionRequest } from "../emission";
import type { Artifact, EmissionBackend } from "./index";
import { getConstants } from "./constants";

const LANGUAGE = 'json';

function render(request: EmissionRequest, artifact: Artifact): string {
  switch (artifact) {
    case 'wrapper':
      return JSON.stringify(request, null, 2) + '\n';
    case 'constants':
      return JSON.stringify(Object.fromEntries(getConstants(request)), null, 2) + '\n';
  }
}

export const jsonBackend: EmissionBackend = {
  language: LANGUAGE,
  fileExtension: 'json',
  render,
};
