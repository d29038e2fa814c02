export { DoxygenRunner, DoxygenRunnerOptions, SpawnFn, SpawnedProcess } from './DoxygenRunner';
export {
  checkToolchain,
  findOnPath,
  filterCommands,
  formatToolchainReport,
  ToolchainOptions,
} from './Toolchain';
