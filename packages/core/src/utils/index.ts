export {
  isPlainObject,
  toArray,
  getText,
  getRecord,
  getRefName,
  getNumber,
  isEmptyValue,
  valuesEqual,
  findChangedFields,
} from './records.js';
