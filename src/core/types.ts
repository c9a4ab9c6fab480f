export type Severity = 'error' | 'warning' | 'info';

export type RuleCategory = 'Security' | 'Usage';

export interface SourceLocation {
  path: string;
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

// Symbols

export type TypeKind = 'class' | 'struct' | 'interface' | 'delegate' | 'enum';

export type SpecialType =
  | 'None'
  | 'System_Object'
  | 'System_Boolean'
  | 'System_Void'
  | 'System_Int32'
  | 'System_String'
  | 'System_IntPtr'
  | 'System_UIntPtr';

export type MethodKind = 'ordinary' | 'constructor' | 'destructor' | 'lambda' | 'accessor';

export interface TypeSymbol {
  readonly metadataName: string;
  readonly name: string;
  readonly typeKind: TypeKind;
  readonly specialType: SpecialType;
  readonly isValueType: boolean;
  readonly baseType: TypeSymbol | null;
  readonly interfaces: readonly TypeSymbol[];
  readonly declaresFinalizer: boolean;
  readonly locations: readonly SourceLocation[];
}

export interface ParameterSymbol {
  readonly name: string;
  readonly ordinal: number;
  readonly type: TypeSymbol;
}

export interface DllImportData {
  readonly moduleName: string;
  readonly entryPoint: string | null;
}

export interface MethodSymbol {
  readonly id: string;
  readonly name: string;
  readonly methodKind: MethodKind;
  readonly containingType: TypeSymbol;
  /** `null` for methods returning void. */
  readonly returnType: TypeSymbol | null;
  readonly parameters: readonly ParameterSymbol[];
  readonly isStatic: boolean;
  readonly dllImportData: DllImportData | null;
}

export interface FieldSymbol {
  readonly id: string;
  readonly name: string;
  readonly containingType: TypeSymbol;
  readonly type: TypeSymbol;
  readonly isStatic: boolean;
}

// Operations

export type ConstantValue =
  | { readonly hasValue: false }
  | { readonly hasValue: true; readonly value: string | number | boolean | null };

interface OperationBase {
  readonly type: TypeSymbol | null;
  readonly constantValue: ConstantValue;
  /** Set on nodes the host synthesized rather than the user wrote. */
  readonly isImplicit: boolean;
  readonly location: SourceLocation;
}

export interface BlockOperation extends OperationBase {
  readonly kind: 'Block';
  readonly operations: readonly OperationNode[];
}

export interface ExpressionStatementOperation extends OperationBase {
  readonly kind: 'ExpressionStatement';
  readonly operation: OperationNode;
}

export interface VariableDeclarationOperation extends OperationBase {
  readonly kind: 'VariableDeclaration';
  readonly local: string;
  readonly initializer: OperationNode | null;
}

export interface ReturnOperation extends OperationBase {
  readonly kind: 'Return';
  readonly returnedValue: OperationNode | null;
}

export interface ThrowOperation extends OperationBase {
  readonly kind: 'Throw';
  readonly exception: OperationNode | null;
}

export interface ConditionalOperation extends OperationBase {
  readonly kind: 'Conditional';
  readonly condition: OperationNode;
  readonly whenTrue: OperationNode;
  readonly whenFalse: OperationNode | null;
}

export interface LiteralOperation extends OperationBase {
  readonly kind: 'Literal';
}

export interface LocalReferenceOperation extends OperationBase {
  readonly kind: 'LocalReference';
  readonly local: string;
}

export interface ParameterReferenceOperation extends OperationBase {
  readonly kind: 'ParameterReference';
  readonly parameter: string;
}

export interface InstanceReferenceOperation extends OperationBase {
  readonly kind: 'InstanceReference';
}

export interface FieldReferenceOperation extends OperationBase {
  readonly kind: 'FieldReference';
  readonly field: FieldSymbol;
  readonly instance: OperationNode | null;
}

export interface SimpleAssignmentOperation extends OperationBase {
  readonly kind: 'SimpleAssignment';
  /** `null` when the left-hand side did not bind, e.g. an undefined symbol. */
  readonly target: OperationNode | null;
  readonly value: OperationNode | null;
}

export interface BinaryOperation extends OperationBase {
  readonly kind: 'Binary';
  readonly operator: string;
  readonly left: OperationNode;
  readonly right: OperationNode;
}

export interface ConversionOperation extends OperationBase {
  readonly kind: 'Conversion';
  readonly operand: OperationNode;
}

export interface InvocationOperation extends OperationBase {
  readonly kind: 'Invocation';
  readonly targetMethod: MethodSymbol;
  readonly instance: OperationNode | null;
  readonly arguments: readonly OperationNode[];
}

export interface ObjectCreationOperation extends OperationBase {
  readonly kind: 'ObjectCreation';
  readonly constructorMethod: MethodSymbol | null;
  readonly arguments: readonly OperationNode[];
}

export interface DelegateCreationOperation extends OperationBase {
  readonly kind: 'DelegateCreation';
  readonly target: OperationNode;
}

export interface AnonymousFunctionOperation extends OperationBase {
  readonly kind: 'AnonymousFunction';
  readonly symbol: MethodSymbol;
  readonly body: BlockOperation;
}

export interface MethodReferenceOperation extends OperationBase {
  readonly kind: 'MethodReference';
  readonly method: MethodSymbol;
  readonly instance: OperationNode | null;
}

export interface InvalidOperation extends OperationBase {
  readonly kind: 'Invalid';
  readonly children: readonly OperationNode[];
}

export type OperationNode =
  | BlockOperation
  | ExpressionStatementOperation
  | VariableDeclarationOperation
  | ReturnOperation
  | ThrowOperation
  | ConditionalOperation
  | LiteralOperation
  | LocalReferenceOperation
  | ParameterReferenceOperation
  | InstanceReferenceOperation
  | FieldReferenceOperation
  | SimpleAssignmentOperation
  | BinaryOperation
  | ConversionOperation
  | InvocationOperation
  | ObjectCreationOperation
  | DelegateCreationOperation
  | AnonymousFunctionOperation
  | MethodReferenceOperation
  | InvalidOperation;

export type OperationKind = OperationNode['kind'];

export interface OperationBlock {
  readonly owner: MethodSymbol;
  readonly isGenerated: boolean;
  readonly body: BlockOperation;
}

// Rules and diagnostics

export interface RuleDescriptor {
  readonly id: string;
  readonly title: string;
  readonly messageFormat: string;
  readonly description: string;
  readonly category: RuleCategory;
  readonly defaultSeverity: Severity;
  readonly isEnabledByDefault: boolean;
  readonly helpUri: string | null;
  readonly customTags: readonly string[];
}

export interface Diagnostic {
  readonly ruleId: string;
  readonly severity: Severity;
  readonly category: RuleCategory;
  readonly message: string;
  readonly location: SourceLocation;
  readonly additionalLocations: readonly SourceLocation[];
}

export interface BuildFlags {
  /** Opaque build-time switch; rules ship disabled by default while it is set. */
  buildingExtension: boolean;
}

// Configuration

export interface RuleConfig {
  enabled?: boolean;
  severity?: Severity;
}

export interface OpguardConfig {
  rules: Record<string, RuleConfig>;
  buildingExtension: boolean;
}
