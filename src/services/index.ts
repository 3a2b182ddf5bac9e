export { bomService } from './bom.service';
export * from './bom.service';
