export {
  IFungibleToken,
  InMemoryToken,
  ReceiveHook,
  TokenSnapshot,
} from './tokenLedger';
