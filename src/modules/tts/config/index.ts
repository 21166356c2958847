export { cartesiaConfig } from './cartesia.config';
