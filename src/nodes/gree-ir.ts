import { registerGreeIrNode } from './gree-ir-node';

export = registerGreeIrNode;
