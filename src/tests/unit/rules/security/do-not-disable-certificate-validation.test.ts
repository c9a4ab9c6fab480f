import { RuleEngine } from '../../../../core/engine';
import { CompilationSnapshotInput, parseCompilationSnapshot } from '../../../../core/snapshot';
import { WellKnownTypeNames } from '../../../../core/well-known-types';
import {
    alwaysReturnsTrue,
    createCertificateValidationRule,
    doNotDisableCertificateValidation
} from '../../../../rules/security/do-not-disable-certificate-validation';
import { descendants } from '../../../../core/traversal';
import { CALLBACK_PARAMETERS, DELEGATE_LOCATION, Ops, TestHelpers, at } from '../../../utils/test-helpers';

function analyze(snapshot: CompilationSnapshotInput) {
    const engine = new RuleEngine([doNotDisableCertificateValidation], TestHelpers.createConfig());
    return engine.run(parseCompilationSnapshot(snapshot));
}

describe('CA5359: do not disable certificate validation', () => {
    describe('descriptor', () => {
        it('should describe a security rule tagged for telemetry', () => {
            const { descriptor } = doNotDisableCertificateValidation;

            expect(descriptor.id).toBe('CA5359');
            expect(descriptor.category).toBe('Security');
            expect(descriptor.defaultSeverity).toBe('warning');
            expect(descriptor.isEnabledByDefault).toBe(true);
            expect(descriptor.helpUri).toBeNull();
            expect(descriptor.customTags).toEqual(['Telemetry']);
            expect(Object.isFrozen(descriptor)).toBe(true);
        });

        it('should ship disabled by default in extension builds', () => {
            const rule = createCertificateValidationRule({ buildingExtension: true });

            expect(rule.descriptor.isEnabledByDefault).toBe(false);
        });

        it('should only register for delegate creations', () => {
            expect([...doNotDisableCertificateValidation.interestedInKinds()]).toEqual(['DelegateCreation']);
        });
    });

    describe('lambda callbacks', () => {
        it('should report a lambda that returns true', () => {
            const { diagnostics } = analyze(TestHelpers.certificateSnapshot());

            expect(diagnostics).toEqual([
                {
                    ruleId: 'CA5359',
                    severity: 'warning',
                    category: 'Security',
                    message: 'The certificate validation callback always returns true, so any server certificate is accepted',
                    location: DELEGATE_LOCATION,
                    additionalLocations: []
                }
            ]);
        });

        it('should report once per delegate creation when every return is true', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({
                    body: [
                        Ops.conditional(
                            Ops.parameter('errors', WellKnownTypeNames.SystemNetSecuritySslPolicyErrors, at(14)),
                            Ops.returns(Ops.boolean(true, at(15)), at(15)),
                            null,
                            at(14)
                        ),
                        Ops.returns(Ops.boolean(true, at(16)), at(16))
                    ]
                })
            );

            expect(diagnostics).toHaveLength(1);
            expect(diagnostics[0].location).toEqual(DELEGATE_LOCATION);
        });

        it('should not report when any return yields false', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({
                    body: [Ops.returns(Ops.boolean(true, at(14)), at(14)), Ops.returns(Ops.boolean(false, at(15)), at(15))]
                })
            );

            expect(diagnostics).toEqual([]);
        });

        it('should not report when a return yields a non-constant value', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({
                    body: [Ops.returns(Ops.parameter('trusted', WellKnownTypeNames.SystemBoolean, at(14)), at(14))]
                })
            );

            expect(diagnostics).toEqual([]);
        });

        it('should not report a body without returns', () => {
            const { diagnostics } = analyze(TestHelpers.certificateSnapshot({ body: [Ops.throws(at(14))] }));

            expect(diagnostics).toEqual([]);
        });

        it('should not report when the callback signature does not match', () => {
            const parameters = [...CALLBACK_PARAMETERS];
            parameters[1] = { name: 'certificate', type: WellKnownTypeNames.SystemObject };

            expect(analyze(TestHelpers.certificateSnapshot({ parameters })).diagnostics).toEqual([]);
            expect(analyze(TestHelpers.certificateSnapshot({ parameters: CALLBACK_PARAMETERS.slice(0, 3) })).diagnostics).toEqual([]);
            expect(analyze(TestHelpers.certificateSnapshot({ returnType: 'System.Int32' })).diagnostics).toEqual([]);
        });

        it('should ignore delegates of other types', () => {
            const { diagnostics } = analyze(TestHelpers.certificateSnapshot({ delegateType: 'System.Func`1' }));

            expect(diagnostics).toEqual([]);
        });
    });

    describe('method reference callbacks', () => {
        it('should report a referenced method that returns true', () => {
            const { diagnostics } = analyze(TestHelpers.certificateSnapshot({ target: 'method' }));

            expect(diagnostics).toHaveLength(1);
            expect(diagnostics[0].ruleId).toBe('CA5359');
            expect(diagnostics[0].location).toEqual(DELEGATE_LOCATION);
        });

        it('should ignore host-synthesized returns in the referenced body', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({
                    target: 'method',
                    body: [Ops.returns(Ops.boolean(true, at(14)), at(14)), Ops.returns(null, at(15), true)]
                })
            );

            expect(diagnostics).toHaveLength(1);
        });

        it('should report an expression-bodied method whose return the host inserted', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({
                    target: 'method',
                    body: [Ops.returns(Ops.boolean(true, at(14, 80)), at(14, 80), true)]
                })
            );

            expect(diagnostics).toHaveLength(1);
            expect(diagnostics[0].location).toEqual(DELEGATE_LOCATION);
        });

        it('should not report when the only return is host-inserted and empty', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({ target: 'method', body: [Ops.returns(null, at(15), true)] })
            );

            expect(diagnostics).toEqual([]);
        });

        it('should not report when the referenced method has no body', () => {
            const { diagnostics } = analyze(TestHelpers.certificateSnapshot({ target: 'method', hasBody: false }));

            expect(diagnostics).toEqual([]);
        });

        it('should not report a referenced method with the wrong signature', () => {
            const { diagnostics } = analyze(
                TestHelpers.certificateSnapshot({ target: 'method', parameters: CALLBACK_PARAMETERS.slice(1) })
            );

            expect(diagnostics).toEqual([]);
        });
    });

    describe('missing well-known types', () => {
        it.each([
            WellKnownTypeNames.SystemNetSecurityRemoteCertificateValidationCallback,
            WellKnownTypeNames.SystemObject,
            WellKnownTypeNames.SystemSecurityCryptographyX509CertificatesX509Certificate,
            WellKnownTypeNames.SystemSecurityCryptographyX509CertificatesX509Chain,
            WellKnownTypeNames.SystemNetSecuritySslPolicyErrors
        ])('should stay inert when %s is absent', typeName => {
            const snapshot = TestHelpers.certificateSnapshot({
                omitTypes: [typeName],
                delegateType: 'System.Func`1',
                parameters: []
            });

            const result = analyze(snapshot);

            expect(result.inertRules).toEqual(['CA5359']);
            expect(result.diagnostics).toEqual([]);
        });
    });

    describe('alwaysReturnsTrue', () => {
        function bodyOperations(statements: Parameters<typeof Ops.block>[0]) {
            const compilation = TestHelpers.createCompilation({
                types: [{ metadataName: 'Sample.Client', typeKind: 'class' }],
                methods: [{ id: 'Sample.Client.Check', name: 'Check', containingType: 'Sample.Client' }],
                operationBlocks: [{ owner: 'Sample.Client.Check', body: Ops.block(statements) }]
            });
            return descendants(compilation.operationBlocks[0].body);
        }

        it('should hold when every return is the constant true', () => {
            expect(alwaysReturnsTrue(bodyOperations([Ops.returns(Ops.boolean(true))]))).toBe(true);
        });

        it('should reject an empty return even after a true return', () => {
            expect(
                alwaysReturnsTrue(bodyOperations([Ops.returns(Ops.boolean(true, at(2)), at(2)), Ops.returns(null, at(3))]))
            ).toBe(false);
        });

        it('should reject a body without returns', () => {
            expect(alwaysReturnsTrue(bodyOperations([]))).toBe(false);
        });

        it('should reject constant values other than true', () => {
            const one = { kind: 'Literal' as const, type: 'System.Int32', constantValue: 1, location: at(2, 16) };

            expect(alwaysReturnsTrue(bodyOperations([Ops.returns(one)]))).toBe(false);
        });
    });
});
