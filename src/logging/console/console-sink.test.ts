/**
 * Unit tests for console sink
 */

import { createConsoleSink } from './console-sink';

describe('createConsoleSink', () => {
  let mockConsole: { log: ReturnType<typeof vi.fn>; error: ReturnType<typeof vi.fn> };

  beforeEach(() => {
    mockConsole = {
      log: vi.fn(),
      error: vi.fn()
    };
  });

  describe('routing', () => {
    test('should write DEBUG and INFO to stdout', () => {
      const sink = createConsoleSink(mockConsole, { colors: false });

      sink.write('debug line', 0);
      sink.write('info line', 1);

      expect(mockConsole.log).toHaveBeenNthCalledWith(1, 'debug line');
      expect(mockConsole.log).toHaveBeenNthCalledWith(2, 'info line');
      expect(mockConsole.error).not.toHaveBeenCalled();
    });

    test('should write WARNING and CRITICAL to stderr', () => {
      const sink = createConsoleSink(mockConsole, { colors: false });

      sink.write('warning line', 2);
      sink.write('critical line', 3);

      expect(mockConsole.error).toHaveBeenNthCalledWith(1, 'warning line');
      expect(mockConsole.error).toHaveBeenNthCalledWith(2, 'critical line');
      expect(mockConsole.log).not.toHaveBeenCalled();
    });
  });

  describe('colours', () => {
    test('should colour warnings yellow when enabled', () => {
      const sink = createConsoleSink(mockConsole, { colors: true });

      sink.write('hot', 2);

      expect(mockConsole.error).toHaveBeenCalledWith('\u001b[33mhot\u001b[39m');
    });

    test('should colour critical lines red when enabled', () => {
      const sink = createConsoleSink(mockConsole, { colors: true });

      sink.write('down', 3);

      expect(mockConsole.error).toHaveBeenCalledWith('\u001b[31mdown\u001b[39m');
    });

    test('should leave INFO lines unstyled', () => {
      const sink = createConsoleSink(mockConsole, { colors: true });

      sink.write('plain', 1);

      expect(mockConsole.log).toHaveBeenCalledWith('plain');
    });
  });
});
