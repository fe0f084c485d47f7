import { parseAlertExport, splitExportRows } from './alert-export.parser';

const EXPORT = [
  'Alert ID,Ticker,Name,Description,Time',
  '2001000001,BINANCE:BTCUSDT,BTC exit,"{""type"": ""exit"", ""exchange"": ""binance"", ""symbol"": ""BTCUSDT"", ""alert_id"": ""btc-exit"", ""close"": ""150"", ""timestamp"": ""2024-03-10T12:00:00Z""}",2024-03-10T12:00:00Z',
  '2001000002,BINANCE:BTCUSDT,BTC pyramid,"{',
  '  ""type"": ""pyramid"", ""exchange"": ""binance"", ""symbol"": ""BTCUSDT"",',
  '  ""alert_id"": ""btc-1"", ""index"": 1, ""size"": ""0.5"", ""close"": 100,',
  '  ""timestamp"": ""2024-03-10T08:00:00+01:00""',
  '}",2024-03-10T07:00:00Z',
].join('\n');

describe('parseAlertExport', () => {
  it('should join multi-line messages into one row each', () => {
    expect(splitExportRows(EXPORT)).toHaveLength(2);
  });

  it('should return the signals in firing order with their price and time', () => {
    const { signals, rejected } = parseAlertExport(EXPORT);

    expect(rejected).toEqual([]);
    expect(signals).toEqual([
      {
        type: 'pyramid',
        exchange: 'binance',
        symbol: 'BTCUSDT',
        index: 1,
        size: 0.5,
        alertId: 'btc-1',
        exportId: '2001000002',
        price: 100,
        time: new Date('2024-03-10T07:00:00Z'),
      },
      {
        type: 'exit',
        exchange: 'binance',
        symbol: 'BTCUSDT',
        alertId: 'btc-exit',
        exportId: '2001000001',
        price: 150,
        time: new Date('2024-03-10T12:00:00Z'),
      },
    ]);
  });

  it('should drop signals fired before the cutoff', () => {
    const { signals } = parseAlertExport(EXPORT, new Date('2024-03-10T09:00:00Z'));

    expect(signals.map((s) => s.alertId)).toEqual(['btc-exit']);
  });

  it('should report rows it cannot replay', () => {
    const content = [
      '3001,BINANCE:ETHUSDT,No price,"{""type"": ""exit"", ""exchange"": ""binance"", ""symbol"": ""ETHUSDT"", ""alert_id"": ""eth-exit"", ""timestamp"": ""2024-03-10T12:00:00Z""}",x',
      '3002,BINANCE:ETHUSDT,Local time,"{""type"": ""exit"", ""exchange"": ""binance"", ""symbol"": ""ETHUSDT"", ""alert_id"": ""eth-exit"", ""close"": 10, ""timestamp"": ""2024-03-10 12:00:00""}",x',
      '3003,BINANCE:ETHUSDT,Plain text,Price crossed 10,x',
    ].join('\n');

    const { signals, rejected } = parseAlertExport(content);

    expect(signals).toEqual([]);
    expect(rejected).toEqual([
      { exportId: '3001', reason: 'Alert message needs a positive close price' },
      { exportId: '3002', reason: 'Alert message needs a timestamp with an offset' },
      { exportId: '3003', reason: 'Row carries no JSON alert message' },
    ]);
  });

  it('should reject a message that is not a webhook signal', () => {
    const content =
      '3004,BINANCE:ETHUSDT,Old format,"{""action"": ""buy"", ""exchange"": ""binance"", ""symbol"": ""ETHUSDT"", ""close"": 10}",x';

    const { rejected } = parseAlertExport(content);

    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toMatch(/^Malformed signal: /);
  });

  it('should leave an unquoted message as written', () => {
    const content =
      '4001,OKX:BTCUSDT,Unquoted,{"type": "exit", "exchange": "okx", "symbol": "BTC-USDT", "alert_id": "okx-exit", "close": 1, "timestamp": "2024-03-10T00:00:00Z", "note": ""},x';

    const { signals } = parseAlertExport(content);

    expect(signals).toHaveLength(1);
    expect(signals[0]).toMatchObject({ type: 'exit', alertId: 'okx-exit', price: 1 });
  });
});
