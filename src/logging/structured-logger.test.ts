import { LogLevel, parseLogLevel, StructuredLogger } from './structured-logger';

describe('StructuredLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('writes one JSON line with context merged in', () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const log = new StructuredLogger({ minLevel: LogLevel.INFO, json: true, context: { node: 'n1' } });

    log.info('ContractHost', 'Transaction committed', { txId: 'abc', fn: 'Burn' });

    expect(write).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      component: 'ContractHost',
      message: 'Transaction committed',
      node: 'n1',
      txId: 'abc',
      fn: 'Burn',
    });
  });

  it('drops entries below the threshold', () => {
    const write = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const log = new StructuredLogger({ minLevel: LogLevel.WARN, json: true });

    log.info('Main', 'ignored');

    expect(write).not.toHaveBeenCalled();
  });

  it('parses level names', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN);
    expect(parseLogLevel('Silent')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('loud')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined, LogLevel.ERROR)).toBe(LogLevel.ERROR);
  });
});
