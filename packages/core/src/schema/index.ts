export { sheets, sheetRows } from './sheets.js';
