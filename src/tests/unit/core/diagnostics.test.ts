import { defineRuleDescriptor, enabledByDefaultIfNotBuildingExtension } from '../../../core/descriptors';
import { compareDiagnostics, createDiagnostic, formatLocation, formatMessage } from '../../../core/diagnostics';
import { at } from '../../utils/test-helpers';

describe('diagnostics', () => {
    const descriptor = defineRuleDescriptor({ id: 'CA2216', category: 'Usage', isEnabledByDefault: true });

    describe('formatMessage', () => {
        it('should substitute positional placeholders', () => {
            expect(formatMessage("'{0}' and '{1}'", ['a', 'b'])).toBe("'a' and 'b'");
        });

        it('should leave placeholders without arguments as written', () => {
            expect(formatMessage('{0} {1}', ['a'])).toBe('a {1}');
        });
    });

    describe('createDiagnostic', () => {
        it('should take defaults from the descriptor', () => {
            const diagnostic = createDiagnostic(descriptor, at(4), { messageArgs: ['Handle'] });

            expect(diagnostic).toEqual({
                ruleId: 'CA2216',
                severity: 'warning',
                category: 'Usage',
                message: "Disposable type 'Handle' holds a native resource handle but does not declare a finalizer",
                location: at(4),
                additionalLocations: []
            });
            expect(Object.isFrozen(diagnostic)).toBe(true);
        });
    });

    describe('ordering', () => {
        it('should order by path, position and rule id', () => {
            const later = createDiagnostic(descriptor, at(9));
            const earlier = createDiagnostic(descriptor, at(3));
            const otherFile = createDiagnostic(descriptor, at(1, 1, 'Zeta.cs'));

            expect([otherFile, later, earlier].sort(compareDiagnostics)).toEqual([earlier, later, otherFile]);
        });

        it('should format locations as path:line:column', () => {
            expect(formatLocation(at(7, 3))).toBe('Client.cs:7:3');
        });
    });

    describe('build flags', () => {
        it('should enable rules by default only outside extension builds', () => {
            expect(enabledByDefaultIfNotBuildingExtension({ buildingExtension: false })).toBe(true);
            expect(enabledByDefaultIfNotBuildingExtension({ buildingExtension: true })).toBe(false);
        });
    });
});
