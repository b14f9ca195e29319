/**
 * Vocabulary files: declarative type declarations in YAML or JSON.
 *
 * ```yaml
 * name: cxo
 * version: "1.0"
 * types:
 *   cxo.User:
 *     Name: string
 *     Age: uint32
 *   cxo.Group:
 *     Name: string
 *     Members: { type: refs, schema: cxo.User }
 *     Leader: { type: ref, schema: cxo.User }
 *     Extra: { type: dynamic }
 * ```
 *
 * Every entry under `types` is a struct whose fields keep the order they are
 * written in. Field values are the same descriptors `Registrar.register` takes.
 */

import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { createRegistry, type Registry } from './schema/Registry';
import { struct, type FieldDescriptor, type TypeDescriptor } from './schema/SchemaBuilder';
import { logger } from './utils/Logger';

const log = logger.child('vocabulary');

// ============================================================================
// Shape
// ============================================================================

const tag = z.string().optional();

const TypeDescriptorSchema: z.ZodType<TypeDescriptor> = z.lazy(() =>
    z.union([
        z.string().min(1),
        z.object({
            type: z.literal('array'),
            length: z.number().int().nonnegative(),
            items: TypeDescriptorSchema,
            tag,
        }).strict(),
        z.object({
            type: z.literal('slice'),
            items: TypeDescriptorSchema,
            tag,
        }).strict(),
        z.object({
            type: z.literal('struct'),
            fields: z.record(FieldDescriptorSchema),
            tag,
        }).strict(),
    ])
);

const FieldDescriptorSchema: z.ZodType<FieldDescriptor> = z.lazy(() =>
    z.union([
        TypeDescriptorSchema,
        z.object({ type: z.literal('ref'), schema: z.string().min(1).optional(), tag }).strict(),
        z.object({ type: z.literal('refs'), schema: z.string().min(1).optional(), tag }).strict(),
        z.object({ type: z.literal('dynamic'), tag }).strict(),
    ])
);

const VocabularySchema = z.object({
    name: z.string().min(1),
    version: z.string().optional(),
    types: z.record(z.record(FieldDescriptorSchema)),
});

export type Vocabulary = z.infer<typeof VocabularySchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Parses and validates a vocabulary. The file extension picks the parser;
 * anything other than `.json` is read as YAML.
 *
 * @throws {ConfigurationError} on a syntax error or an invalid shape
 */
export function loadVocabulary(content: string, filePath: string): Vocabulary {
    let raw: unknown;
    try {
        raw = path.extname(filePath).toLowerCase() === '.json' ? JSON.parse(content) : yaml.parse(content);
    } catch (error) {
        throw new ConfigurationError(
            `${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    const result = VocabularySchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`${filePath}: invalid vocabulary: ${issues}`);
    }
    return result.data;
}

/**
 * Registers every declared type and finalizes the registry.
 *
 * @throws {RegistrationError} for declarations the registrar rejects
 */
export function registryFromVocabulary(vocabulary: Vocabulary): Registry {
    const registry = createRegistry(reg => {
        for (const [name, fields] of Object.entries(vocabulary.types)) {
            reg.register(name, struct(fields));
        }
    });
    log.info(`vocabulary "${vocabulary.name}" registered ${registry.size} types`);
    return registry;
}
