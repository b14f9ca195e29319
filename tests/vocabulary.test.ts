import { describe, it, expect, vi, afterEach } from 'vitest';
import { toHex } from '../src/digest';
import { ConfigurationError, RegistrationError } from '../src/errors';
import { createRegistry } from '../src/schema/Registry';
import { dynamic, ref, refs, struct } from '../src/schema/SchemaBuilder';
import { schemaToString } from '../src/schema/Schema';
import { loadVocabulary, registryFromVocabulary } from '../src/vocabulary';

const YAML_SOURCE = `
name: cxo
types:
  cxo.User:
    Name: string
    Age: uint32
  cxo.Group:
    Name: string
    Members: { type: refs, schema: cxo.User }
    Leader: { type: ref, schema: cxo.User }
    Extra: { type: dynamic }
`;

describe('loadVocabulary', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('parses YAML and keeps field order', () => {
        const vocabulary = loadVocabulary(YAML_SOURCE, 'cxo.yaml');
        expect(vocabulary.name).toBe('cxo');
        expect(Object.keys(vocabulary.types['cxo.Group'])).toEqual(['Name', 'Members', 'Leader', 'Extra']);
    });

    it('parses JSON', () => {
        const vocabulary = loadVocabulary(
            JSON.stringify({ name: 'x', version: '2', types: { 'x.Point': { X: 'int32', Y: 'int32' } } }),
            'x.json'
        );
        expect(vocabulary.version).toBe('2');
        expect(vocabulary.types['x.Point']).toEqual({ X: 'int32', Y: 'int32' });
    });

    it('builds the same registry as declaring in code', () => {
        vi.spyOn(console, 'info').mockImplementation(() => { });
        const fromFile = registryFromVocabulary(loadVocabulary(YAML_SOURCE, 'cxo.yaml'));
        const fromCode = createRegistry(reg => {
            reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
            reg.register('cxo.Group', struct({
                Name: 'string',
                Members: refs('cxo.User'),
                Leader: ref('cxo.User'),
                Extra: dynamic(),
            }));
        });

        expect(toHex(fromFile.reference())).toBe(toHex(fromCode.reference()));
        expect(schemaToString(fromFile.schemaByName('cxo.Group'))).toBe(
            'cxo.Group struct{Name string; Members []*cxo.User; Leader *cxo.User; Extra *dynamic}'
        );
    });

    it('accepts nested arrays, slices and structs', () => {
        const vocabulary = loadVocabulary(`
name: geo
types:
  geo.Shape:
    Points:
      type: slice
      items: { type: array, length: 2, items: float64 }
    Style:
      type: struct
      fields:
        Color: string
        Width: uint8
`, 'geo.yml');
        vi.spyOn(console, 'info').mockImplementation(() => { });
        const registry = registryFromVocabulary(vocabulary);
        expect(schemaToString(registry.schemaByName('geo.Shape'))).toBe(
            'geo.Shape struct{Points [][2]float64; Style struct{Color string; Width uint8}}'
        );
    });

    it('reports syntax errors as ConfigurationError', () => {
        expect(() => loadVocabulary('{ not json', 'bad.json')).toThrow(ConfigurationError);
        expect(() => loadVocabulary('a: [1, 2', 'bad.yaml')).toThrow(ConfigurationError);
    });

    it('reports invalid shapes with the offending path', () => {
        expect(() => loadVocabulary('name: x\ntypes: []\n', 'x.yaml')).toThrow(/x\.yaml: invalid vocabulary: types: /);
        expect(() => loadVocabulary('types: {}\n', 'x.yaml')).toThrow(/name: Required/);
        expect(() => loadVocabulary(
            'name: x\ntypes:\n  T:\n    A: { type: ref, target: U }\n',
            'x.yaml'
        )).toThrow(ConfigurationError);
    });

    it('leaves declaration errors to the registrar', () => {
        const vocabulary = loadVocabulary('name: x\ntypes:\n  T:\n    A: Missing\n', 'x.yaml');
        expect(() => registryFromVocabulary(vocabulary)).toThrow(RegistrationError);
    });
});
