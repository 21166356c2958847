export { AudioAssembler } from './audio-assembler.service';
export type { AudioAssemblerOptions } from './audio-assembler.service';
