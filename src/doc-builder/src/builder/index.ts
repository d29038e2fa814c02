export { DocBuilder, BuildChoices, PreparedBuild } from './DocBuilder';
