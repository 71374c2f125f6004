export {
  COMMAND_PARAMS,
  type CommandParam,
  type RawCommandParams,
  CallbackParamSchema,
  SignMessageParamsSchema,
  SignPersonalMessageParamsSchema,
  SignTransactionParamsSchema,
  type SignMessageParams,
  type SignTransactionParams,
  type TransactionRequest,
  type SignMessageCommand,
  type SignPersonalMessageCommand,
  type SignTransactionCommand,
  type Command,
} from './command.schema.js';
