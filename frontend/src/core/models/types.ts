export type ModelInfo = {
  id: string;
  name: string;
};
