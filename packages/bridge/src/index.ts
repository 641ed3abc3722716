export { RegionLinkEntryPoint, type EntryPointOptions } from './entry-point';
