export {
  filterEvents,
  getStockEvents,
  describeEarnings,
  describeSplit,
  type CorporateActionRecords,
} from "./event-filter.js";
