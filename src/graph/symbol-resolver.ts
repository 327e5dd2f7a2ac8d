import { NodeLabel, RelationshipType } from '../database/models';
import type {
  CallEdge,
  ConstructorEdge,
  InheritanceEdge,
  ParameterTypeEdge,
  TypeLabel,
  TypeRef,
} from '../database/models';
import { buildImportedTypeMap } from '../parsers/java/import-utils';
import { splitQualifiedType } from '../parsers/java/signature-utils';
import {
  CallKind,
  CallRecord,
  FileRecord,
  MethodRecord,
  TypeDeclaration,
} from '../parsers/java/types';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('symbol-resolver');

interface IndexedType {
  ref: TypeRef;
  package?: string;
  declaration: TypeDeclaration;
}

export interface ResolvedEdges {
  inheritance: InheritanceEdge[];
  parameterTypes: ParameterTypeEdge[];
  calls: CallEdge[];
  constructors: ConstructorEdge[];
}

const ALL_TYPE_LABELS: readonly TypeLabel[] = [NodeLabel.CLASS, NodeLabel.INTERFACE];

function typeKey(file: string, name: string): string {
  return `${file}\u0000${name}`;
}

function exactlyOne<T>(candidates: readonly T[]): T | undefined {
  return candidates.length === 1 ? candidates[0] : undefined;
}

/**
 * Resolves type and method references against every declaration of a run.
 *
 * Only unambiguous references produce edges: a package-qualified match wins when
 * exactly one exists, otherwise the simple name has to match exactly one type.
 * Zero or several candidates mean no edge, never a guess.
 */
export class SymbolResolver {
  private typesByName = new Map<string, IndexedType[]>();
  private typesByKey = new Map<string, IndexedType>();
  private methodsByType = new Map<string, MethodRecord[]>();
  private methodsByName = new Map<string, MethodRecord[]>();
  private importsByFile = new Map<string, Map<string, string>>();

  constructor(private readonly files: readonly FileRecord[]) {
    for (const file of files) {
      this.importsByFile.set(file.path, buildImportedTypeMap(file.imports));

      for (const declaration of [...file.classes, ...file.interfaces]) {
        const indexed: IndexedType = {
          ref: {
            label: declaration.kind === 'class' ? NodeLabel.CLASS : NodeLabel.INTERFACE,
            name: declaration.name,
            file: declaration.file,
          },
          package: declaration.package,
          declaration,
        };
        this.append(this.typesByName, declaration.name, indexed);
        this.typesByKey.set(typeKey(declaration.file, declaration.name), indexed);
      }

      for (const method of file.methods) {
        if (method.class_name) {
          this.append(this.methodsByType, typeKey(method.file, method.class_name), method);
        }
        this.append(this.methodsByName, method.name, method);
      }
    }
  }

  /**
   * Resolve a type reference. `packageHint` comes from an import or a `type_package`;
   * a package written into `typeText` takes precedence over it.
   */
  resolveType(
    typeText: string,
    packageHint?: string,
    labels: readonly TypeLabel[] = ALL_TYPE_LABELS
  ): TypeRef | undefined {
    const { package: qualifiedPackage, name } = splitQualifiedType(typeText);
    if (!name) return undefined;

    const candidates = (this.typesByName.get(name) ?? []).filter(candidate =>
      labels.includes(candidate.ref.label)
    );
    if (candidates.length === 0) return undefined;

    const packageName = qualifiedPackage ?? packageHint;
    if (packageName) {
      const qualified = exactlyOne(candidates.filter(candidate => candidate.package === packageName));
      if (qualified) return qualified.ref;
    }

    return exactlyOne(candidates)?.ref;
  }

  /**
   * Resolve a name as written in `file`, using that file's single-type imports as package hint
   */
  resolveTypeInFile(
    typeText: string,
    file: string,
    labels: readonly TypeLabel[] = ALL_TYPE_LABELS
  ): TypeRef | undefined {
    const { name } = splitQualifiedType(typeText);
    const hint = this.importsByFile.get(file)?.get(name);
    return this.resolveType(typeText, hint, labels);
  }

  resolveSuperclass(className: string, file: string): TypeRef | undefined {
    const indexed = this.typesByKey.get(typeKey(file, className));
    if (!indexed || indexed.declaration.kind !== 'class' || !indexed.declaration.extends) {
      return undefined;
    }
    return this.resolveTypeInFile(indexed.declaration.extends, file, [NodeLabel.CLASS]);
  }

  /**
   * The single method a call refers to, or undefined when none or several match
   */
  resolveCall(caller: MethodRecord, call: CallRecord): MethodRecord | undefined {
    const named = (methods: readonly MethodRecord[]): MethodRecord[] =>
      methods.filter(method => method.name === call.method_name);

    switch (call.call_type) {
      case CallKind.SAME_CLASS:
      case CallKind.THIS: {
        if (!caller.class_name) return undefined;
        return exactlyOne(named(this.methodsOf(caller.file, caller.class_name)));
      }
      case CallKind.SUPER: {
        if (!caller.class_name) return undefined;
        const parent = this.resolveSuperclass(caller.class_name, caller.file);
        return parent ? exactlyOne(named(this.methodsOf(parent.file, parent.name))) : undefined;
      }
      case CallKind.STATIC: {
        const target = this.resolveCallTarget(call, caller.file);
        if (!target) return undefined;
        return exactlyOne(
          named(this.methodsOf(target.file, target.name)).filter(method => method.is_static)
        );
      }
      case CallKind.INSTANCE: {
        const { name } = splitQualifiedType(call.target_class);
        if (this.typesByName.has(name)) {
          const target = this.resolveCallTarget(call, caller.file);
          return target ? exactlyOne(named(this.methodsOf(target.file, target.name))) : undefined;
        }
        return exactlyOne(this.methodsByName.get(call.method_name) ?? []);
      }
      case CallKind.CONSTRUCTOR:
        return undefined;
    }
  }

  resolveConstructor(call: CallRecord, file: string): TypeRef | undefined {
    if (call.call_type !== CallKind.CONSTRUCTOR) return undefined;
    return call.target_package
      ? this.resolveType(call.target_class, call.target_package, [NodeLabel.CLASS])
      : this.resolveTypeInFile(call.target_class, file, [NodeLabel.CLASS]);
  }

  /**
   * Every edge that depends on the complete declaration set
   */
  resolveAll(): ResolvedEdges {
    const edges: ResolvedEdges = {
      inheritance: this.resolveInheritance(),
      parameterTypes: [],
      calls: [],
      constructors: [],
    };

    for (const file of this.files) {
      for (const method of file.methods) {
        for (const parameter of method.parameters) {
          const target = this.resolveType(parameter.type, parameter.type_package);
          if (target) {
            edges.parameterTypes.push({
              method_signature: method.method_signature,
              index: parameter.index,
              target,
            });
          }
        }

        for (const call of method.calls) {
          if (call.call_type === CallKind.CONSTRUCTOR) {
            const target = this.resolveConstructor(call, method.file);
            if (target) {
              edges.constructors.push({ caller: method.method_signature, target });
            }
            continue;
          }

          const callee = this.resolveCall(method, call);
          if (callee) {
            const edge: CallEdge = {
              caller: method.method_signature,
              callee: callee.method_signature,
              call_type: call.call_type,
            };
            if (call.qualifier) edge.qualifier = call.qualifier;
            edges.calls.push(edge);
          }
        }
      }
    }

    logger.debug('References resolved', {
      inheritance: edges.inheritance.length,
      parameterTypes: edges.parameterTypes.length,
      calls: edges.calls.length,
      constructors: edges.constructors.length,
    });

    return edges;
  }

  private resolveInheritance(): InheritanceEdge[] {
    const edges: InheritanceEdge[] = [];

    for (const file of this.files) {
      for (const declaration of file.classes) {
        const from: TypeRef = { label: NodeLabel.CLASS, name: declaration.name, file: file.path };
        if (declaration.extends) {
          const to = this.resolveTypeInFile(declaration.extends, file.path, [NodeLabel.CLASS]);
          if (to) edges.push({ type: RelationshipType.EXTENDS, from, to });
        }
        for (const name of declaration.implements) {
          const to = this.resolveTypeInFile(name, file.path, [NodeLabel.INTERFACE]);
          if (to) edges.push({ type: RelationshipType.IMPLEMENTS, from, to });
        }
      }

      for (const declaration of file.interfaces) {
        const from: TypeRef = {
          label: NodeLabel.INTERFACE,
          name: declaration.name,
          file: file.path,
        };
        for (const name of declaration.extends) {
          const to = this.resolveTypeInFile(name, file.path, [NodeLabel.INTERFACE]);
          if (to) edges.push({ type: RelationshipType.EXTENDS, from, to });
        }
      }
    }

    return edges;
  }

  private resolveCallTarget(call: CallRecord, file: string): TypeRef | undefined {
    return call.target_package
      ? this.resolveType(call.target_class, call.target_package)
      : this.resolveTypeInFile(call.target_class, file);
  }

  private methodsOf(file: string, typeName: string): MethodRecord[] {
    return this.methodsByType.get(typeKey(file, typeName)) ?? [];
  }

  private append<T>(map: Map<string, T[]>, key: string, value: T): void {
    const list = map.get(key);
    if (list) {
      list.push(value);
    } else {
      map.set(key, [value]);
    }
  }
}
