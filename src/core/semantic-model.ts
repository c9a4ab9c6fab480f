import { BlockOperation, DllImportData, FieldSymbol, MethodSymbol, OperationBlock, TypeSymbol } from './types';

/**
 * Read-only queries over one compilation. Every query is a pure function of
 * the snapshot it was built from.
 */
export interface SemanticModel {
  readonly assemblyName: string;
  readonly operationBlocks: readonly OperationBlock[];
  resolveType(metadataName: string): TypeSymbol | undefined;
  typesEqual(a: TypeSymbol | null | undefined, b: TypeSymbol | null | undefined): boolean;
  interfacesOf(type: TypeSymbol): ReadonlySet<TypeSymbol>;
  hasFinalizer(type: TypeSymbol): boolean;
  interopMarker(method: MethodSymbol): DllImportData | undefined;
  operationBlockOf(method: MethodSymbol): BlockOperation | undefined;
}

export class Compilation implements SemanticModel {
  private readonly blocksByOwner: ReadonlyMap<string, OperationBlock>;
  private readonly interfaceCache = new Map<string, ReadonlySet<TypeSymbol>>();

  constructor(
    public readonly assemblyName: string,
    private readonly types: ReadonlyMap<string, TypeSymbol>,
    private readonly methods: ReadonlyMap<string, MethodSymbol>,
    private readonly fields: ReadonlyMap<string, FieldSymbol>,
    public readonly operationBlocks: readonly OperationBlock[]
  ) {
    this.blocksByOwner = new Map(operationBlocks.map(block => [block.owner.id, block]));
  }

  public resolveType(metadataName: string): TypeSymbol | undefined {
    return this.types.get(metadataName);
  }

  public resolveMethod(id: string): MethodSymbol | undefined {
    return this.methods.get(id);
  }

  public resolveField(id: string): FieldSymbol | undefined {
    return this.fields.get(id);
  }

  public typesEqual(a: TypeSymbol | null | undefined, b: TypeSymbol | null | undefined): boolean {
    if (!a || !b) {
      return false;
    }
    return a.metadataName === b.metadataName;
  }

  public interfacesOf(type: TypeSymbol): ReadonlySet<TypeSymbol> {
    const cached = this.interfaceCache.get(type.metadataName);
    if (cached) {
      return cached;
    }

    const all = new Set<TypeSymbol>();
    const pending: TypeSymbol[] = [];
    for (let current: TypeSymbol | null = type; current; current = current.baseType) {
      pending.push(...current.interfaces);
    }
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next || all.has(next)) continue;
      all.add(next);
      pending.push(...next.interfaces);
    }

    this.interfaceCache.set(type.metadataName, all);
    return all;
  }

  public hasFinalizer(type: TypeSymbol): boolean {
    return type.declaresFinalizer;
  }

  public interopMarker(method: MethodSymbol): DllImportData | undefined {
    return method.dllImportData ?? undefined;
  }

  public operationBlockOf(method: MethodSymbol): BlockOperation | undefined {
    return this.blocksByOwner.get(method.id)?.body;
  }
}
