export { startRunConsumer, parseRunEntry, toStreamEntries } from './run-consumer.js';
