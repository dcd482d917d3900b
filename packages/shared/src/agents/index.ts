export {
  TradeAgent,
  pairHsFields,
  applyAutofill,
  type TradeAgentOptions,
  type TradeFillOptions,
  type HsFieldPair,
} from './trade-agent';
