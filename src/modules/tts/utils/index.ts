export { classifySynthesisError } from './error-classifier';
export { collectAudioBytes } from './audio-bytes';
