export {
  presentReply,
  presentTurnError,
  presentBeginError,
  presentInvalidRequest,
} from './chat-presenter';
