/**
 * Two peers sharing an object graph: one declares the vocabulary and stores
 * objects, the other learns the registry over the wire and reads them back.
 */

import { describe, it, expect } from 'vitest';
import { InMemoryPack } from '../src/adapters/InMemoryPack';
import { toHex } from '../src/digest';
import { MsgType, decodeMessage, encodeMessage } from '../src/protocol';
import { createRegistry, decodeRegistry } from '../src/schema/Registry';
import { ReferenceType } from '../src/schema/Schema';
import { refs, struct } from '../src/schema/SchemaBuilder';
import { schemaSize } from '../src/schema/size';

describe('users and groups', () => {
    const registry = createRegistry(reg => {
        reg.register('cxo.User', struct({ Name: 'string', Age: 'uint32' }));
        reg.register('cxo.Group', struct({ Name: 'string', Members: refs('cxo.User') }));
    });

    it('resolves the group schema to the registered user schema', () => {
        const group = registry.schemaByName('cxo.Group');
        if (group.type !== 'struct') throw new Error('expected a struct');

        expect(group.fields).toHaveLength(2);
        const members = group.fields[1].schema;
        expect(members.type).toBe('reference');
        if (members.type !== 'reference' || members.referenceType !== ReferenceType.Slice) {
            throw new Error('expected a reference list');
        }
        expect(members.elem).toBe(registry.schemaByName('cxo.User'));
        expect(members.elem.type).toBe('struct');
    });

    it('measures an encoded group exactly', async () => {
        const pack = new InMemoryPack(registry);
        const alice = await pack.add(registry.pack('cxo.User', { Name: 'Alice', Age: 21 }));
        const bob = await pack.add(registry.pack('cxo.User', { Name: 'Bob', Age: 32 }));
        const data = registry.pack('cxo.Group', { Name: 'devs', Members: [alice, bob] });

        expect(schemaSize(registry.schemaByName('cxo.Group'), data)).toBe(data.length);
    });

    it('lets a peer read the graph after receiving the registry', async () => {
        const pack = new InMemoryPack(registry);
        const alice = await pack.add(registry.pack('cxo.User', { Name: 'Alice', Age: 21 }));
        const bob = await pack.add(registry.pack('cxo.User', { Name: 'Bob', Age: 32 }));
        const groupKey = await pack.add(registry.pack('cxo.Group', { Name: 'devs', Members: [alice, bob] }));

        // the peer asks for the registry by reference, then receives it
        const request = decodeMessage(encodeMessage({ type: MsgType.RequestRegistry, ref: registry.reference() }));
        if (request.type !== MsgType.RequestRegistry) throw new Error('expected a registry request');
        expect(toHex(request.ref)).toBe(toHex(registry.reference()));

        const reply = decodeMessage(encodeMessage({ type: MsgType.Registry, reg: registry.encode() }));
        if (reply.type !== MsgType.Registry) throw new Error('expected a registry');
        const remote = decodeRegistry(reply.reg);
        expect(toHex(remote.reference())).toBe(toHex(request.ref));

        // the peer stores what it receives in its own pack
        const remotePack = new InMemoryPack(remote);
        for (const key of [alice, bob, groupKey]) {
            const data = await pack.get(key);
            if (data === undefined) throw new Error('object not found');
            const frame = decodeMessage(encodeMessage({ type: MsgType.Data, data }));
            if (frame.type !== MsgType.Data) throw new Error('expected data');
            await remotePack.add(frame.data);
        }

        const groupData = await remotePack.get(groupKey);
        if (groupData === undefined) throw new Error('group not found');
        const group = remote.value('cxo.Group', groupData);
        expect(group.fieldByName('Name').string()).toBe('devs');

        const names: string[] = [];
        for (const key of group.fieldByName('Members').references()) {
            const member = await remotePack.get(key);
            if (member === undefined) throw new Error('member not found');
            names.push(remote.value('cxo.User', member).fieldByName('Name').string());
        }
        expect(names).toEqual(['Alice', 'Bob']);
    });
});
