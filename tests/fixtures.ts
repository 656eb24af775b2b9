export const DAILY_HEADER =
  'ticker,date,rs_to_spy,ret_intraday,ret_1d,rs_rank_21d,rs_rank_252d,pp_volume,ratio_pct_dist_to_atr_pct,above_sma10,above_sma20,group'

export const WEEKLY_HEADER = 'ticker,date,stage_label_core'

export function csv(header: string, ...rows: string[]): string {
  return [header, ...rows].join('\n') + '\n'
}

// AAPL: 3일치 (원본 순서 뒤섞임), MSFT: 1일치, GLD: Commodity
export const DAILY_CSV = csv(
  DAILY_HEADER,
  'AAPL,2024-01-04,1.5,0.012,-0.005,0.9,0.95,Pocket,3.1,True,True,Market',
  'MSFT,2024-01-04,0.8,0.0,0.01,0.5,0.4,Normal,12.25,False,1,Leader',
  'AAPL,2024-01-02,1.0,0.01,0.02,0.8,0.9,Normal,2.5,False,False,Market',
  'GLD,2024-01-04,0.6,-0.01,0.003,,0.86,,,,,Commodity',
  'AAPL,2024-01-03,1.2,0.005,0.01,0.85,0.92,Normal,2.8,True,False,Market',
)

export const WEEKLY_CSV = csv(
  WEEKLY_HEADER,
  'AAPL,2024-01-05,2',
  'AAPL,2023-12-29,1',
  'MSFT,2024-01-05,3.0',
)
