import { Reasoner, createReasoner } from './reasoner.js';

export interface ServerContainer {
    reasoner: Reasoner;
}

export function createContainer(): ServerContainer {
    return {
        reasoner: createReasoner(),
    };
}
