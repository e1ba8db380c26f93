/**
 * Aligner collaborator: contract, empty-input handling and Effect service
 */

export { type Aligner, alignWith, trivialAlignment } from "./aligner";
export { AlignerService, type AlignerServiceShape } from "./service";
