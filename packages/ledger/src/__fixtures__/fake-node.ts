import type { NodeProvider } from '../node';

const provider: NodeProvider = {
  genesis: async () => {},
  clone: async () => {},
  initialize: async () => {
    throw new Error('fixture node has no repository');
  },
  serve: async () => {},
};

export default provider;
