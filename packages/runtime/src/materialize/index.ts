export { materializeTable, finishTable, type MaterializeOptions } from './materializer.js';
