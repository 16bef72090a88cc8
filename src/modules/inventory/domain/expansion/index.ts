export {
  dedupeNewItems,
  planExpansionDrafts,
  planNewItemDrafts,
  selectExpansionItems,
} from './planner';
export type { NewItemIntroduction, PlannerContext } from './planner';
