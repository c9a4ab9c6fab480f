import { readFileSync } from 'fs';
import { z } from 'zod';
import { Compilation } from './semantic-model';
import { SnapshotError } from './errors';
import { assertNever } from './traversal';
import {
  BlockOperation,
  ConstantValue,
  FieldSymbol,
  MethodSymbol,
  OperationBlock,
  OperationNode,
  SourceLocation,
  TypeSymbol
} from './types';

// ============================================================================
// SCHEMAS
// ============================================================================

export const LocationSchema = z.object({
  path: z.string().min(1),
  startLine: z.number().int().positive(),
  startColumn: z.number().int().positive(),
  endLine: z.number().int().positive(),
  endColumn: z.number().int().positive()
});

export const TypeKindSchema = z.enum(['class', 'struct', 'interface', 'delegate', 'enum']);

export const SpecialTypeSchema = z.enum([
  'None',
  'System_Object',
  'System_Boolean',
  'System_Void',
  'System_Int32',
  'System_String',
  'System_IntPtr',
  'System_UIntPtr'
]);

export const MethodKindSchema = z.enum(['ordinary', 'constructor', 'destructor', 'lambda', 'accessor']);

export const TypeEntrySchema = z.object({
  metadataName: z.string().min(1),
  typeKind: TypeKindSchema,
  specialType: SpecialTypeSchema.default('None'),
  baseType: z.string().nullable().default(null),
  interfaces: z.array(z.string()).default([]),
  locations: z.array(LocationSchema).default([])
});

export const MethodEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  containingType: z.string(),
  methodKind: MethodKindSchema.default('ordinary'),
  returnType: z.string().nullable().default(null),
  parameters: z.array(z.object({ name: z.string(), type: z.string() })).default([]),
  isStatic: z.boolean().default(false),
  dllImport: z
    .object({ moduleName: z.string().min(1), entryPoint: z.string().nullable().default(null) })
    .nullable()
    .default(null)
});

export const FieldEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  containingType: z.string(),
  type: z.string(),
  isStatic: z.boolean().default(false)
});

type RawLocation = z.infer<typeof LocationSchema>;

interface RawOperationBase {
  type?: string | null;
  constantValue?: string | number | boolean | null;
  isImplicit?: boolean;
  location: RawLocation;
}

export type RawOperation = RawOperationBase &
  (
    | { kind: 'Block'; operations: RawOperation[] }
    | { kind: 'ExpressionStatement'; operation: RawOperation }
    | { kind: 'VariableDeclaration'; local: string; initializer?: RawOperation | null }
    | { kind: 'Return'; returnedValue?: RawOperation | null }
    | { kind: 'Throw'; exception?: RawOperation | null }
    | { kind: 'Conditional'; condition: RawOperation; whenTrue: RawOperation; whenFalse?: RawOperation | null }
    | { kind: 'Literal' }
    | { kind: 'LocalReference'; local: string }
    | { kind: 'ParameterReference'; parameter: string }
    | { kind: 'InstanceReference' }
    | { kind: 'FieldReference'; field: string; instance?: RawOperation | null }
    | { kind: 'SimpleAssignment'; target?: RawOperation | null; value?: RawOperation | null }
    | { kind: 'Binary'; operator: string; left: RawOperation; right: RawOperation }
    | { kind: 'Conversion'; operand: RawOperation }
    | { kind: 'Invocation'; method: string; instance?: RawOperation | null; arguments?: RawOperation[] }
    | { kind: 'ObjectCreation'; constructorMethod?: string | null; arguments?: RawOperation[] }
    | { kind: 'DelegateCreation'; target: RawOperation }
    | { kind: 'AnonymousFunction'; symbol: string; body: RawOperation }
    | { kind: 'MethodReference'; method: string; instance?: RawOperation | null }
    | { kind: 'Invalid'; children?: RawOperation[] }
  );

const base = {
  type: z.string().nullable().optional(),
  constantValue: z.union([z.string(), z.number(), z.boolean(), z.null()]).optional(),
  isImplicit: z.boolean().optional(),
  location: LocationSchema
};

export const OperationSchema: z.ZodType<RawOperation> = z.lazy(() => {
  const operation = OperationSchema;
  const optionalOperation = operation.nullable().optional();
  return z.discriminatedUnion('kind', [
    z.object({ ...base, kind: z.literal('Block'), operations: z.array(operation) }),
    z.object({ ...base, kind: z.literal('ExpressionStatement'), operation }),
    z.object({ ...base, kind: z.literal('VariableDeclaration'), local: z.string(), initializer: optionalOperation }),
    z.object({ ...base, kind: z.literal('Return'), returnedValue: optionalOperation }),
    z.object({ ...base, kind: z.literal('Throw'), exception: optionalOperation }),
    z.object({
      ...base,
      kind: z.literal('Conditional'),
      condition: operation,
      whenTrue: operation,
      whenFalse: optionalOperation
    }),
    z.object({ ...base, kind: z.literal('Literal') }),
    z.object({ ...base, kind: z.literal('LocalReference'), local: z.string() }),
    z.object({ ...base, kind: z.literal('ParameterReference'), parameter: z.string() }),
    z.object({ ...base, kind: z.literal('InstanceReference') }),
    z.object({ ...base, kind: z.literal('FieldReference'), field: z.string(), instance: optionalOperation }),
    z.object({ ...base, kind: z.literal('SimpleAssignment'), target: optionalOperation, value: optionalOperation }),
    z.object({ ...base, kind: z.literal('Binary'), operator: z.string(), left: operation, right: operation }),
    z.object({ ...base, kind: z.literal('Conversion'), operand: operation }),
    z.object({
      ...base,
      kind: z.literal('Invocation'),
      method: z.string(),
      instance: optionalOperation,
      arguments: z.array(operation).optional()
    }),
    z.object({
      ...base,
      kind: z.literal('ObjectCreation'),
      constructorMethod: z.string().nullable().optional(),
      arguments: z.array(operation).optional()
    }),
    z.object({ ...base, kind: z.literal('DelegateCreation'), target: operation }),
    z.object({ ...base, kind: z.literal('AnonymousFunction'), symbol: z.string(), body: operation }),
    z.object({ ...base, kind: z.literal('MethodReference'), method: z.string(), instance: optionalOperation }),
    z.object({ ...base, kind: z.literal('Invalid'), children: z.array(operation).optional() })
  ]);
});

export const OperationBlockEntrySchema = z.object({
  owner: z.string(),
  isGenerated: z.boolean().default(false),
  body: OperationSchema
});

export const CompilationSnapshotSchema = z.object({
  assemblyName: z.string().min(1),
  types: z.array(TypeEntrySchema),
  methods: z.array(MethodEntrySchema).default([]),
  fields: z.array(FieldEntrySchema).default([]),
  operationBlocks: z.array(OperationBlockEntrySchema).default([])
});

export type CompilationSnapshot = z.infer<typeof CompilationSnapshotSchema>;
export type CompilationSnapshotInput = z.input<typeof CompilationSnapshotSchema>;

// ============================================================================
// LOADING
// ============================================================================

export function loadCompilation(snapshotPath: string): Compilation {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(snapshotPath, 'utf-8'));
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SnapshotError(`cannot read snapshot: ${reason}`, snapshotPath);
  }
  return parseCompilationSnapshot(json, snapshotPath);
}

export function parseCompilationSnapshot(json: unknown, source?: string): Compilation {
  const result = CompilationSnapshotSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new SnapshotError(`invalid snapshot: ${issues}`, source);
  }
  return new SnapshotBinder(result.data, source).bind();
}

// ============================================================================
// BINDING
// ============================================================================

type RawType = CompilationSnapshot['types'][number];

const NO_CONSTANT: ConstantValue = Object.freeze({ hasValue: false });

class SnapshotBinder {
  private readonly rawTypes: Map<string, RawType>;
  private readonly finalizerOwners: Set<string>;
  private readonly types = new Map<string, TypeSymbol>();
  private readonly inProgress = new Set<string>();
  private readonly methods = new Map<string, MethodSymbol>();
  private readonly fields = new Map<string, FieldSymbol>();

  constructor(
    private readonly snapshot: CompilationSnapshot,
    private readonly source?: string
  ) {
    this.rawTypes = this.indexUnique(snapshot.types, type => type.metadataName, 'type');
    this.finalizerOwners = new Set(
      snapshot.methods.filter(method => method.methodKind === 'destructor').map(method => method.containingType)
    );
  }

  public bind(): Compilation {
    for (const name of this.rawTypes.keys()) {
      this.bindType(name, 'types');
    }

    this.indexUnique(this.snapshot.methods, method => method.id, 'method');
    for (const raw of this.snapshot.methods) {
      const owner = `method '${raw.id}'`;
      this.methods.set(
        raw.id,
        Object.freeze({
          id: raw.id,
          name: raw.name,
          methodKind: raw.methodKind,
          containingType: this.bindType(raw.containingType, owner),
          returnType: raw.returnType === null ? null : this.bindType(raw.returnType, owner),
          parameters: Object.freeze(
            raw.parameters.map((parameter, ordinal) =>
              Object.freeze({ name: parameter.name, ordinal, type: this.bindType(parameter.type, owner) })
            )
          ),
          isStatic: raw.isStatic,
          dllImportData: raw.dllImport === null ? null : Object.freeze({ ...raw.dllImport })
        })
      );
    }

    this.indexUnique(this.snapshot.fields, field => field.id, 'field');
    for (const raw of this.snapshot.fields) {
      const owner = `field '${raw.id}'`;
      this.fields.set(
        raw.id,
        Object.freeze({
          id: raw.id,
          name: raw.name,
          containingType: this.bindType(raw.containingType, owner),
          type: this.bindType(raw.type, owner),
          isStatic: raw.isStatic
        })
      );
    }

    this.indexUnique(this.snapshot.operationBlocks, block => block.owner, 'operation block owner');
    const blocks = this.snapshot.operationBlocks.map((raw, index): OperationBlock => {
      const path = `operationBlocks.${index}`;
      return Object.freeze({
        owner: this.lookupMethod(raw.owner, path),
        isGenerated: raw.isGenerated,
        body: this.bindBlock(raw.body, `${path}.body`)
      });
    });

    return new Compilation(this.snapshot.assemblyName, this.types, this.methods, this.fields, Object.freeze(blocks));
  }

  private bindType(name: string, referencedFrom: string): TypeSymbol {
    const bound = this.types.get(name);
    if (bound) {
      return bound;
    }

    const raw = this.rawTypes.get(name);
    if (!raw) {
      throw this.error(`unknown type '${name}' referenced from ${referencedFrom}`);
    }
    if (this.inProgress.has(name)) {
      throw this.error(`type '${name}' inherits from itself`);
    }

    this.inProgress.add(name);
    const owner = `type '${name}'`;
    const symbol: TypeSymbol = Object.freeze({
      metadataName: raw.metadataName,
      name: raw.metadataName.slice(raw.metadataName.lastIndexOf('.') + 1),
      typeKind: raw.typeKind,
      specialType: raw.specialType,
      isValueType: raw.typeKind === 'struct' || raw.typeKind === 'enum',
      baseType: raw.baseType === null ? null : this.bindType(raw.baseType, owner),
      interfaces: Object.freeze(raw.interfaces.map(iface => this.bindType(iface, owner))),
      declaresFinalizer: this.finalizerOwners.has(name),
      locations: Object.freeze(raw.locations.map(freezeLocation))
    });
    this.inProgress.delete(name);
    this.types.set(name, symbol);
    return symbol;
  }

  private bindBlock(raw: RawOperation, path: string): BlockOperation {
    const node = this.bindOperation(raw, path);
    if (node.kind !== 'Block') {
      throw this.error(`${path}: expected a Block operation, found ${node.kind}`);
    }
    return node;
  }

  private bindOptional(raw: RawOperation | null | undefined, path: string): OperationNode | null {
    return raw === null || raw === undefined ? null : this.bindOperation(raw, path);
  }

  private bindAll(raw: RawOperation[] | undefined, path: string): readonly OperationNode[] {
    return Object.freeze((raw ?? []).map((child, index) => this.bindOperation(child, `${path}.${index}`)));
  }

  private bindOperation(raw: RawOperation, path: string): OperationNode {
    const common = {
      type: raw.type === null || raw.type === undefined ? null : this.bindType(raw.type, path),
      constantValue:
        raw.constantValue === undefined ? NO_CONSTANT : Object.freeze({ hasValue: true as const, value: raw.constantValue }),
      isImplicit: raw.isImplicit ?? false,
      location: freezeLocation(raw.location)
    };

    switch (raw.kind) {
      case 'Block':
        return Object.freeze({ ...common, kind: raw.kind, operations: this.bindAll(raw.operations, `${path}.operations`) });
      case 'ExpressionStatement':
        return Object.freeze({ ...common, kind: raw.kind, operation: this.bindOperation(raw.operation, `${path}.operation`) });
      case 'VariableDeclaration':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          local: raw.local,
          initializer: this.bindOptional(raw.initializer, `${path}.initializer`)
        });
      case 'Return':
        return Object.freeze({ ...common, kind: raw.kind, returnedValue: this.bindOptional(raw.returnedValue, `${path}.returnedValue`) });
      case 'Throw':
        return Object.freeze({ ...common, kind: raw.kind, exception: this.bindOptional(raw.exception, `${path}.exception`) });
      case 'Conditional':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          condition: this.bindOperation(raw.condition, `${path}.condition`),
          whenTrue: this.bindOperation(raw.whenTrue, `${path}.whenTrue`),
          whenFalse: this.bindOptional(raw.whenFalse, `${path}.whenFalse`)
        });
      case 'Literal':
        return Object.freeze({ ...common, kind: raw.kind });
      case 'InstanceReference':
        return Object.freeze({ ...common, kind: raw.kind });
      case 'LocalReference':
        return Object.freeze({ ...common, kind: raw.kind, local: raw.local });
      case 'ParameterReference':
        return Object.freeze({ ...common, kind: raw.kind, parameter: raw.parameter });
      case 'FieldReference':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          field: this.lookupField(raw.field, path),
          instance: this.bindOptional(raw.instance, `${path}.instance`)
        });
      case 'SimpleAssignment':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          target: this.bindOptional(raw.target, `${path}.target`),
          value: this.bindOptional(raw.value, `${path}.value`)
        });
      case 'Binary':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          operator: raw.operator,
          left: this.bindOperation(raw.left, `${path}.left`),
          right: this.bindOperation(raw.right, `${path}.right`)
        });
      case 'Conversion':
        return Object.freeze({ ...common, kind: raw.kind, operand: this.bindOperation(raw.operand, `${path}.operand`) });
      case 'Invocation':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          targetMethod: this.lookupMethod(raw.method, path),
          instance: this.bindOptional(raw.instance, `${path}.instance`),
          arguments: this.bindAll(raw.arguments, `${path}.arguments`)
        });
      case 'ObjectCreation':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          constructorMethod:
            raw.constructorMethod === null || raw.constructorMethod === undefined
              ? null
              : this.lookupMethod(raw.constructorMethod, path),
          arguments: this.bindAll(raw.arguments, `${path}.arguments`)
        });
      case 'DelegateCreation':
        return Object.freeze({ ...common, kind: raw.kind, target: this.bindOperation(raw.target, `${path}.target`) });
      case 'AnonymousFunction':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          symbol: this.lookupMethod(raw.symbol, path),
          body: this.bindBlock(raw.body, `${path}.body`)
        });
      case 'MethodReference':
        return Object.freeze({
          ...common,
          kind: raw.kind,
          method: this.lookupMethod(raw.method, path),
          instance: this.bindOptional(raw.instance, `${path}.instance`)
        });
      case 'Invalid':
        return Object.freeze({ ...common, kind: raw.kind, children: this.bindAll(raw.children, `${path}.children`) });
      default:
        return assertNever(raw);
    }
  }

  private lookupMethod(id: string, path: string): MethodSymbol {
    const method = this.methods.get(id);
    if (!method) {
      throw this.error(`${path}: unknown method '${id}'`);
    }
    return method;
  }

  private lookupField(id: string, path: string): FieldSymbol {
    const field = this.fields.get(id);
    if (!field) {
      throw this.error(`${path}: unknown field '${id}'`);
    }
    return field;
  }

  private indexUnique<T>(entries: readonly T[], keyOf: (entry: T) => string, what: string): Map<string, T> {
    const index = new Map<string, T>();
    for (const entry of entries) {
      const key = keyOf(entry);
      if (index.has(key)) {
        throw this.error(`duplicate ${what} '${key}'`);
      }
      index.set(key, entry);
    }
    return index;
  }

  private error(message: string): SnapshotError {
    return new SnapshotError(message, this.source);
  }
}

function freezeLocation(location: RawLocation): SourceLocation {
  return Object.freeze({ ...location });
}
