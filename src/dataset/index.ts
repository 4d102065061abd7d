/**
 * Datasets and the append engine
 *
 * @module dataset
 */

export { appendValue, resolveNamedRow } from "./append";
export { ArffDataset, type AttributeValue, type DatasetMode } from "./dataset";
