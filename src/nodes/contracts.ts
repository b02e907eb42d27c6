import type { Logger } from '../Logger';

export interface NodeMessage {
    payload?: unknown;
    topic?: string;
}

export interface NodeStatus {
    fill: 'red' | 'green' | 'yellow' | 'blue' | 'grey';
    shape: 'ring' | 'dot';
    text: string;
}

export interface NodeRedNode {
    on(ev: 'input', callback: (msg: NodeMessage) => void): void;
    on(ev: 'close', callback: () => void): void;
    send(msg: NodeMessage): void;
    status(options: NodeStatus): void;
    warn(msg: string): void;
    error(msg: string): void;
}

export type NodeConstructor<TConfig> = (this: NodeRedNode, config: TConfig) => void;

export interface NodeRedRuntime {
    log: Logger;
    nodes: {
        createNode<TConfig>(node: NodeRedNode, config: TConfig): void;
        registerType<TConfig>(type: string, constructor: NodeConstructor<TConfig>): void;
    };
}
