export { CartesiaSpeechSynthesizer, createSpeechSynthesizer } from './speech-synthesizer.service';
