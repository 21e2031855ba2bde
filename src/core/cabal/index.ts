export { CabalSource, type CabalSourceOptions, type CabalSourceStatus } from './cabal-source.js';
export { ClosureResolver, type DependencyLookup, type ClosureResolverOptions } from './closure-resolver.js';
export { GhcPkgClient, parseFieldOutput, type GhcPkgClientOptions, type PackageFields } from './ghc-pkg-client.js';
export { sanitizeHomepage } from './homepage.js';
export {
  findManifestFiles,
  parseManifestDependencies,
  scanManifestDependencies,
  dependencyName,
  resolveTargets
} from './manifest-scanner.js';
export {
  PackageDescriber,
  resolveDocDirs,
  isPathWithin,
  type DocDirs,
  type PackageDescriberOptions,
  type PackageFieldLookup
} from './package-describer.js';
