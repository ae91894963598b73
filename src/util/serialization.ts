export type Serializable = {
  serialize: () => Uint8Array;
};
