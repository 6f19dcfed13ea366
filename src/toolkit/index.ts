/**
 * External genotype toolkit access
 */

export {
  GenotypeToolkit,
  type GenotypeToolkitShape,
  invoke,
  invokeChecked,
  type ToolkitRun,
} from "./service";
