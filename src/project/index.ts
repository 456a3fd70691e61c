/**
 * Project files: persistence, schema and whole-project validation
 */

export { serializeProject, parseProject, saveProject, loadProject } from "./persistence.js";
export { ProjectFileSchema, toProjectDocument } from "./schema.js";
export {
  validateProject,
  collectRecommendations,
  containsSensitiveKeyword,
  type Recommendation,
} from "./validate.js";
