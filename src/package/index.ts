export { parsePackageIdentifier, isPackageIdentifier } from './identifier.js'

export {
  classifyPackage,
  inferPackageType,
  readInstalledType,
  getCandidateDirectories,
  TYPE_INFERENCE_RULES,
  DEFAULT_PACKAGE_TYPE,
  type TypeRule,
  type ClassifyOptions,
} from './classify.js'

export {
  resolvePackagePath,
  findInstallerPathRule,
  assertPackageDirectory,
  getVendorPath,
  NAME_PLACEHOLDER,
} from './resolve.js'
