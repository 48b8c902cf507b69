export type {
  LlmChatMessage,
  LlmChatOptions,
  LlmChatResult,
  LlmProviderHealth,
  LlmServiceAdapter,
  RegisterLlmServiceAdapterOptions,
} from './llm_service.js';
export {
  clearLlmServiceAdapter,
  getLlmServiceAdapter,
  registerLlmServiceAdapter,
  resolveLlmServiceAdapter,
  withLlmServiceAdapter,
} from './llm_service.js';
export {
  HttpLlmService,
  PROVIDER_ENDPOINTS,
  createHttpLlmService,
  isHttpProvider,
  type HttpLlmServiceOptions,
  type HttpProvider,
  type ProviderEndpoint,
} from './http_llm_service.js';
