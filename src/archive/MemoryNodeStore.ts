/**
 * @file MemoryNodeStore — In-Memory Node Storage
 *
 * Default implementation of the node store collaborator: an ordered tree of
 * named nodes with a global, case-insensitive lookup.
 *
 * @module
 */

import type { ArchiveNode, NodeStore } from './types.js';
import { InvalidData, NodeNotFound } from './errors.js';
import { name_equals, nameUnsafe_check } from './names.js';
import { logger_null, type Logger } from '../logging/Logger.js';

const COMPONENT: string = 'store';

/**
 * A node held in memory. Directories keep their children in creation order.
 */
export class MemoryNode implements ArchiveNode {
    public readonly name: string;
    public readonly data: Uint8Array | null;
    private readonly children: MemoryNode[] | null;
    private readonly logger: Logger;

    constructor(name: string, data: Uint8Array | null, logger: Logger) {
        this.name = name;
        this.data = data;
        this.children = data === null ? [] : null;
        this.logger = logger;
    }

    public directory_check(): boolean {
        return this.children !== null;
    }

    public children_list(): ArchiveNode[] {
        return this.children ? [...this.children] : [];
    }

    public child_get(name: string): ArchiveNode | null {
        if (!this.children) return null;
        return this.children.find((c: MemoryNode): boolean => name_equals(c.name, name)) ?? null;
    }

    public child_create(name: string, data?: Uint8Array): ArchiveNode {
        if (!this.children) {
            throw new InvalidData(`Cannot create ${name} inside file ${this.name}`);
        }
        if (nameUnsafe_check(name)) {
            throw new InvalidData(`Invalid node name: '${name}'`);
        }
        const node: MemoryNode = new MemoryNode(name, data ?? null, this.logger);
        this.children.push(node);
        this.logger.trace(COMPONENT, `Created ${data === undefined ? 'directory' : 'file'} ${name} in ${this.name || '<root>'}`);
        return node;
    }

    public child_remove(name: string): void {
        const index: number = this.children
            ? this.children.findIndex((c: MemoryNode): boolean => name_equals(c.name, name))
            : -1;
        if (!this.children || index === -1) {
            throw new NodeNotFound(`${name} not found in ${this.name || '<root>'}`);
        }
        this.children.splice(index, 1);
        this.logger.trace(COMPONENT, `Removed ${name} from ${this.name || '<root>'}`);
    }
}

/**
 * In-memory NodeStore. The root is an unnamed directory.
 *
 * @example
 * ```typescript
 * const store = new MemoryNodeStore();
 * const scripts = store.root_get().child_create('_WORK').child_create('SCRIPTS');
 * scripts.child_create('STARTUP.D', new TextEncoder().encode('// boot'));
 * store.node_find('startup.d'); // → the STARTUP.D node
 * ```
 */
export class MemoryNodeStore implements NodeStore {
    private readonly root: MemoryNode;

    constructor(logger: Logger = logger_null()) {
        this.root = new MemoryNode('', null, logger);
    }

    public root_get(): ArchiveNode {
        return this.root;
    }

    public node_find(name: string): ArchiveNode | null {
        const stack: ArchiveNode[] = this.root.children_list().reverse();
        while (stack.length > 0) {
            const node: ArchiveNode | undefined = stack.pop();
            if (!node) break;
            if (name_equals(node.name, name)) return node;
            stack.push(...node.children_list().reverse());
        }
        return null;
    }
}
