import winston from 'winston';

import { MemoryStream, settle } from '../test-utils/memoryStream';
import { createConsoleFormat, createFileFormat, renderLine } from './formatters';
import { SEVERITY_LEVELS } from './levels';

const STAMP = '2024-01-02 10:30:00.000';

function capture(format: winston.Logform.Format) {
  const stream = new MemoryStream();
  const logger = winston.createLogger({
    levels: SEVERITY_LEVELS,
    level: 'debug',
    transports: [new winston.transports.Stream({ stream, format })],
  });
  return { logger, stream };
}

describe('renderLine', () => {
  it('should render timestamp, severity and logger name before the message', () => {
    expect(renderLine(STAMP, 'INFO    ', 'app', 'started')).toBe('[2024-01-02 10:30:00.000] INFO     app: started');
  });

  it('should indent continuation lines under the message start', () => {
    const indent = ' '.repeat(40);

    expect(renderLine(STAMP, 'INFO    ', 'app', 'first\nsecond\r\nthird')).toBe(
      `[2024-01-02 10:30:00.000] INFO     app: first\n${indent}second\n${indent}third`
    );
  });

  it('should not count color codes towards the indent', () => {
    const colored = '\u001b[32mINFO    \u001b[39m';
    const [, second] = renderLine(STAMP, colored, 'app', 'first\nsecond').split('\n');

    expect(second).toBe(`${' '.repeat(40)}second`);
  });
});

describe('createFileFormat', () => {
  it('should write uncolored lines with a padded severity', async () => {
    const { logger, stream } = capture(createFileFormat('worker'));

    logger.log('warning', 'disk at %d%%', 91);
    await settle();

    const [line] = stream.lines();
    expect(line).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3}\] WARNING  worker: disk at 91%$/);
  });

  it('should label critical records in full', async () => {
    const { logger, stream } = capture(createFileFormat('worker'));

    logger.log('critical', 'out of memory');
    await settle();

    expect(stream.lines()[0]).toMatch(/\] CRITICAL worker: out of memory$/);
  });

  it('should apply interpolation arguments', async () => {
    const { logger, stream } = capture(createFileFormat('worker'));

    logger.log('info', 'hello %s, %d new', 'world', 3);
    await settle();

    expect(stream.lines()[0]).toMatch(/INFO     worker: hello world, 3 new$/);
  });
});

describe('createConsoleFormat', () => {
  it('should color the severity label when asked to', async () => {
    const { logger, stream } = capture(createConsoleFormat('worker', true));

    logger.log('info', 'ready');
    await settle();

    expect(stream.text).toContain('\u001b[32mINFO    \u001b[39m worker: ready');
  });

  it('should leave the line plain otherwise', async () => {
    const { logger, stream } = capture(createConsoleFormat('worker', false));

    logger.log('error', 'failed');
    await settle();

    expect(stream.lines()[0]).toMatch(/\] ERROR    worker: failed$/);
    expect(stream.text).not.toContain('\u001b[');
  });
});
