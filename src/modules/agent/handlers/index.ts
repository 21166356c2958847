export { decodeAgentEvent, rawDataToBuffer } from './event-demultiplexer';
