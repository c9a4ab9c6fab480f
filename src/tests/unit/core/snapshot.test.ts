import { join } from 'path';
import { SnapshotError } from '../../../core/errors';
import { loadCompilation, parseCompilationSnapshot } from '../../../core/snapshot';
import { Ops, TestHelpers, at } from '../../utils/test-helpers';

const FIXTURES = join(__dirname, '../../fixtures/compilations');

describe('compilation snapshots', () => {
    describe('parseCompilationSnapshot', () => {
        it('should bind types, methods, fields and operation blocks', () => {
            const compilation = parseCompilationSnapshot(TestHelpers.nativeHandleSnapshot());

            const handleType = compilation.resolveType('Sample.NativeHandle');
            expect(handleType).toBeDefined();
            expect(handleType?.name).toBe('NativeHandle');
            expect(handleType?.baseType?.metadataName).toBe('System.Object');
            expect(handleType?.interfaces.map(type => type.metadataName)).toEqual(['System.IDisposable']);

            const field = compilation.resolveField('Sample.NativeHandle.handle');
            expect(field?.type.metadataName).toBe('System.IntPtr');
            expect(field?.containingType).toBe(handleType);

            expect(compilation.operationBlocks).toHaveLength(1);
            expect(compilation.operationBlocks[0].owner.id).toBe('Sample.NativeHandle..ctor');
        });

        it('should bind every reference to the same symbol instance', () => {
            const compilation = parseCompilationSnapshot(TestHelpers.nativeHandleSnapshot());
            const [statement] = compilation.operationBlocks[0].body.operations;

            expect(statement.kind).toBe('ExpressionStatement');
            if (statement.kind !== 'ExpressionStatement' || statement.operation.kind !== 'SimpleAssignment') {
                throw new Error('unexpected operation shape');
            }
            const { value } = statement.operation;
            expect(value?.kind).toBe('Invocation');
            if (value?.kind === 'Invocation') {
                expect(value.targetMethod).toBe(compilation.resolveMethod('Sample.NativeHandle.NativeOpen'));
                expect(value.targetMethod.dllImportData).toEqual({ moduleName: 'native.dll', entryPoint: 'native_open' });
            }
        });

        it('should mark value types and finalizers', () => {
            const compilation = parseCompilationSnapshot(
                TestHelpers.nativeHandleSnapshot({ typeKind: 'struct', declaresFinalizer: true })
            );
            const handleType = compilation.resolveType('Sample.NativeHandle');

            expect(handleType?.isValueType).toBe(true);
            expect(handleType?.declaresFinalizer).toBe(true);
            expect(compilation.resolveType('System.Object')?.declaresFinalizer).toBe(false);
        });

        it('should only carry a constant value when the snapshot gives one', () => {
            const compilation = parseCompilationSnapshot(TestHelpers.certificateSnapshot({ target: 'method' }));
            const validate = compilation.resolveMethod('Sample.Client.Validate');
            const body = validate ? compilation.operationBlockOf(validate) : undefined;
            const [returned] = body?.operations ?? [];

            expect(returned?.kind).toBe('Return');
            if (returned?.kind === 'Return') {
                expect(returned.constantValue).toEqual({ hasValue: false });
                expect(returned.returnedValue?.constantValue).toEqual({ hasValue: true, value: true });
            }
        });

        it('should treat a void method as having no return type', () => {
            const compilation = parseCompilationSnapshot(TestHelpers.certificateSnapshot());

            expect(compilation.resolveMethod('Sample.Client.Configure')?.returnType).toBeNull();
        });

        it('should reject snapshots that do not match the schema', () => {
            expect(() => parseCompilationSnapshot({ assemblyName: 'Broken' })).toThrow(SnapshotError);
            expect(() => parseCompilationSnapshot({ assemblyName: 'Broken' })).toThrow('invalid snapshot: types: Required');
        });

        it('should reject unknown operation kinds', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [{ metadataName: 'Sample.Client', typeKind: 'class' }],
                methods: [{ id: 'Sample.Client.Run', name: 'Run', containingType: 'Sample.Client' }]
            });
            const json = {
                ...snapshot,
                operationBlocks: [{ owner: 'Sample.Client.Run', body: { kind: 'Goto', location: at(1) } }]
            };

            expect(() => parseCompilationSnapshot(json)).toThrow(SnapshotError);
        });

        it('should reject references to unknown types', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [{ metadataName: 'Sample.Client', typeKind: 'class', baseType: 'Sample.Missing' }]
            });

            expect(() => parseCompilationSnapshot(snapshot)).toThrow(
                "unknown type 'Sample.Missing' referenced from type 'Sample.Client'"
            );
        });

        it('should reject references to unknown methods', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [{ metadataName: 'Sample.Client', typeKind: 'class' }],
                methods: [{ id: 'Sample.Client.Run', name: 'Run', containingType: 'Sample.Client' }],
                operationBlocks: [
                    { owner: 'Sample.Client.Run', body: Ops.block([Ops.statement(Ops.invoke('Sample.Client.Gone', null, at(2)))]) }
                ]
            });

            expect(() => parseCompilationSnapshot(snapshot)).toThrow(
                "operationBlocks.0.body.operations.0.operation: unknown method 'Sample.Client.Gone'"
            );
        });

        it('should reject duplicate type names', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [{ metadataName: 'System.Object', typeKind: 'class' }]
            });

            expect(() => parseCompilationSnapshot(snapshot)).toThrow("duplicate type 'System.Object'");
        });

        it('should reject cyclic inheritance', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [
                    { metadataName: 'Sample.A', typeKind: 'class', baseType: 'Sample.B' },
                    { metadataName: 'Sample.B', typeKind: 'class', baseType: 'Sample.A' }
                ]
            });

            expect(() => parseCompilationSnapshot(snapshot)).toThrow("type 'Sample.A' inherits from itself");
        });

        it('should require operation block bodies to be blocks', () => {
            const snapshot = TestHelpers.createSnapshot({
                types: [{ metadataName: 'Sample.Client', typeKind: 'class' }],
                methods: [{ id: 'Sample.Client.Run', name: 'Run', containingType: 'Sample.Client' }],
                operationBlocks: [{ owner: 'Sample.Client.Run', body: Ops.returns(null) }]
            });

            expect(() => parseCompilationSnapshot(snapshot)).toThrow(
                'operationBlocks.0.body: expected a Block operation, found Return'
            );
        });

        it('should prefix errors with the snapshot source', () => {
            expect(() => parseCompilationSnapshot({}, 'app.json')).toThrow(/^app\.json: invalid snapshot/);
        });
    });

    describe('loadCompilation', () => {
        it('should load a snapshot file', () => {
            const compilation = loadCompilation(join(FIXTURES, 'native-handles.json'));

            expect(compilation.assemblyName).toBe('Sample.Interop');
            expect(compilation.operationBlocks).toHaveLength(2);
        });

        it('should report malformed JSON as a snapshot error', () => {
            const path = join(FIXTURES, 'malformed.json');

            expect(() => loadCompilation(path)).toThrow(SnapshotError);
            expect(() => loadCompilation(path)).toThrow(/cannot read snapshot/);
        });

        it('should report missing files as a snapshot error', () => {
            expect(() => loadCompilation(join(FIXTURES, 'missing.json'))).toThrow(/missing\.json: cannot read snapshot/);
        });
    });
});
