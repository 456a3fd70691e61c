/**
 * Generators
 *
 * Docker Compose, Ansible and Terraform renderers behind one contract.
 */

export type { Generator, TargetOutcome } from "./types.js";
export { BaseGenerator } from "./base.js";
export { checkProjectStructure } from "./validation.js";
export {
  ComposeGenerator,
  createComposeGenerator,
  formatEnvValue,
  isSensitiveEnvKey,
} from "./compose.js";
export {
  AnsibleGenerator,
  createAnsibleGenerator,
  hasServiceType,
  type AnsibleTask,
} from "./ansible.js";
export { TerraformGenerator, createTerraformGenerator, terraformIdentifier } from "./terraform.js";
export { getGenerator, generateTargets } from "./registry.js";
