export { CAR_MODELS, listModels, matchModel, modelLabel } from './catalog';
export { NOT_ADVERTISED } from './types';
export type { CarModelRow } from './types';
