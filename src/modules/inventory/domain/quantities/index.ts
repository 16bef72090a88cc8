export {
  parseFlag,
  parseMovementDay,
  parseQuantity,
  toDayNumber,
  toUnits,
} from './parse';
