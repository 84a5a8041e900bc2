
import type { Identifier } from "./identifier";
import { compareStrings, MultiMap } from "./util";

/**
 * Identifies one kind of node in a syntax tree.
 *
 * A named and an anonymous node type with the same text are different kinds
 * of node. For example, the keyword `"type"` and a rule named `type` may
 * both appear in the same tree.
 */
export interface NodeType {
  readonly type: string;
  readonly named: boolean;
}

export interface NodeChildren {
  readonly multiple: boolean;
  readonly required: boolean;
  readonly types: readonly NodeType[];
}

export interface SuperTypeDefinitionKind {
  readonly kind: 'supertype';
  readonly subtypes: readonly NodeType[];
}

export interface RegularDefinitionKind {
  readonly kind: 'regular';
  readonly fields: ReadonlyMap<Identifier, NodeChildren> | null;
  readonly children: NodeChildren | null;
}

export type NodeTypeDefinitionKind
  = SuperTypeDefinitionKind
  | RegularDefinitionKind

export interface NodeTypeDefinition {
  readonly nodeType: NodeType;
  readonly kind: NodeTypeDefinitionKind;
  /**
   * Set on the node type that is the root of every tree.
   */
  readonly root: boolean;
  /**
   * Set on node types that may appear anywhere, such as comments.
   */
  readonly extra: boolean;
}

export function createNodeType(type: string, named = true): NodeType {
  return { type, named };
}

export function createNodeChildren(multiple: boolean, required: boolean, types: readonly NodeType[]): NodeChildren {
  return { multiple, required, types };
}

export interface DefinitionFlags {
  root?: boolean;
  extra?: boolean;
}

export function defineSuperType(nodeType: NodeType, subtypes: readonly NodeType[], { root = false, extra = false }: DefinitionFlags = {}): NodeTypeDefinition {
  return {
    nodeType,
    kind: { kind: 'supertype', subtypes },
    root,
    extra,
  };
}

export function defineRegular(
  nodeType: NodeType,
  fields: Iterable<[Identifier, NodeChildren]> | null,
  children: NodeChildren | null = null,
  { root = false, extra = false }: DefinitionFlags = {},
): NodeTypeDefinition {
  return {
    nodeType,
    kind: {
      kind: 'regular',
      fields: fields === null ? null : new Map(fields),
      children,
    },
    root,
    extra,
  };
}

export function defineTerminal(nodeType: NodeType, flags: DefinitionFlags = {}): NodeTypeDefinition {
  return defineRegular(nodeType, null, null, flags);
}

/**
 * Get a string that is unique for every distinct node type, suitable for use
 * as a key in a map.
 */
export function nodeTypeKey(nodeType: NodeType): string {
  return `${nodeType.named ? 'named' : 'anonymous'}:${nodeType.type}`;
}

export function formatNodeType(nodeType: NodeType): string {
  return nodeType.named ? nodeType.type : `"${nodeType.type}"`;
}

export function isSuperTypeDefinition(definition: NodeTypeDefinition): boolean {
  return definition.kind.kind === 'supertype';
}

/**
 * A terminal is a regular node type that declares neither fields nor
 * children. Note that an empty `fields` object still counts as declaring
 * fields.
 */
export function isTerminalDefinition(definition: NodeTypeDefinition): boolean {
  return definition.kind.kind === 'regular'
      && definition.kind.fields === null
      && definition.kind.children === null;
}

export function isRegularDefinition(definition: NodeTypeDefinition): boolean {
  return definition.kind.kind === 'regular' && !isTerminalDefinition(definition);
}

function sortedNames<T extends string>(names: Iterable<T>): T[] {
  return [...new Set(names)].sort(compareStrings);
}

/**
 * An in-memory representation of a `node-types.json` file.
 */
export class NodeTypesDocument {

  private readonly definitions: readonly NodeTypeDefinition[];
  private readonly definitionsByName = new MultiMap<string, NodeTypeDefinition>();

  constructor(definitions: Iterable<NodeTypeDefinition>) {
    this.definitions = [...definitions];
    for (const definition of this.definitions) {
      this.definitionsByName.add(definition.nodeType.type, definition);
    }
    Object.freeze(this);
  }

  public getDefinitions(): readonly NodeTypeDefinition[] {
    return this.definitions;
  }

  public getSuperTypeDefinitions(): NodeTypeDefinition[] {
    return this.definitions.filter(isSuperTypeDefinition);
  }

  public getRegularDefinitions(): NodeTypeDefinition[] {
    return this.definitions.filter(isRegularDefinition);
  }

  public getTerminalDefinitions(): NodeTypeDefinition[] {
    return this.definitions.filter(isTerminalDefinition);
  }

  public getDefinitionCount(): number {
    return this.definitions.length;
  }

  /**
   * Find the definition of exactly the given node type.
   *
   * If the same node type was defined more than once, the first definition
   * is returned.
   */
  public getDefinition(nodeType: NodeType): NodeTypeDefinition | null {
    for (const definition of this.definitionsByName.get(nodeType.type)) {
      if (definition.nodeType.named === nodeType.named) {
        return definition;
      }
    }
    return null;
  }

  public hasDefinition(nodeType: NodeType): boolean {
    return this.getDefinition(nodeType) !== null;
  }

  /**
   * Get both the named and the anonymous definitions that use the given text.
   */
  public getDefinitionsNamed(name: string): NodeTypeDefinition[] {
    return [...this.definitionsByName.get(name)];
  }

  public getNodeTypeNames(): string[] {
    return sortedNames(this.definitions.map(definition => definition.nodeType.type));
  }

  public getSuperTypeNames(): string[] {
    return sortedNames(this.getSuperTypeDefinitions().map(definition => definition.nodeType.type));
  }

  public getRegularNames(): string[] {
    return sortedNames(this.getRegularDefinitions().map(definition => definition.nodeType.type));
  }

  public getTerminalNames(): string[] {
    return sortedNames(this.getTerminalDefinitions().map(definition => definition.nodeType.type));
  }

  /**
   * Get the name of every field of every regular node type, without
   * duplicates and sorted.
   */
  public getFieldNames(): Identifier[] {
    const names: Identifier[] = [];
    for (const definition of this.definitions) {
      if (definition.kind.kind === 'regular' && definition.kind.fields !== null) {
        names.push(...definition.kind.fields.keys());
      }
    }
    return sortedNames(names);
  }

}
