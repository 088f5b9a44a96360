export type TradeTime = number | string | null;

export interface WalletPnlData {
  holding: number;
  realized: number;
  unrealized: number;
  currentValue: number;
  costBasis: number;
  lastTradeTime: TradeTime;
}

export interface WalletPnlRecord extends WalletPnlData {
  address: string;
  fetchedAt: number;
}

export interface AggregatePnl {
  holding: number;
  realized: number;
  unrealized: number;
  currentValue: number;
  costBasis: number;
  lastTradeTime: number | null;
  failedWallets: string[];
  staleWallets: string[];
  staleCount: number;
}

export interface PnlSnapshot {
  runAt: number;
  wallets: WalletPnlRecord[];
  aggregate: AggregatePnl;
}

export interface PortfolioSource {
  getWalletPnl(wallet: string, token: string): Promise<WalletPnlData>;
}
