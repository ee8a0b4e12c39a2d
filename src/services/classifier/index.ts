/**
 * Classifier Module
 *
 * @module services/classifier
 */

export { classifyPath, classifyFile, sniffSignature, SNIFF_LENGTH } from './format-classifier.js';
export type { FormatClassification } from './format-classifier.js';
