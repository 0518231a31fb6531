import { describe, it, expect } from 'vitest';
import { ScriptedCommands } from '../../testing/doubles';
import { ClipboardAdapter, MacClipboard, TextInjector } from './TextInjector';

class MemoryClipboard implements ClipboardAdapter {
  public text = '';

  public async writeText(text: string): Promise<void> {
    this.text = text;
  }
}

const setup = (retryCount = 2) => {
  const commands = new ScriptedCommands();
  const clipboard = new MemoryClipboard();
  const injector = new TextInjector({
    clipboard,
    pasteDelayMs: 0,
    retryCount,
    retryDelayMs: 0,
    commandRunner: commands.run
  });

  return { commands, clipboard, injector };
};

describe('TextInjector', () => {
  it('should write text to the clipboard', async () => {
    const { clipboard, injector } = setup();

    await injector.writeClipboard('hello world');

    expect(clipboard.text).toBe('hello world');
  });

  it('should send Cmd+V through System Events', async () => {
    const { commands, injector } = setup();

    await injector.paste();

    expect(commands.calls.map((call) => call.args)).toEqual([
      ['-e', 'tell application "System Events" to keystroke "v" using command down']
    ]);
  });

  it('should retry a failed paste keystroke', async () => {
    const { commands, injector } = setup(3);
    commands.failures.push(new Error('busy'));

    await injector.paste();

    expect(commands.calls).toHaveLength(2);
  });

  it('should give up after the configured attempts', async () => {
    const { commands, injector } = setup(2);
    commands.failures.push(new Error('not authorized'), new Error('still not authorized'));

    await expect(injector.paste()).rejects.toThrow(
      'Paste failed after 2 attempts. attempt 1: not authorized | attempt 2: still not authorized'
    );
    expect(commands.calls).toHaveLength(2);
  });

  it('should press Return to send', async () => {
    const { commands, injector } = setup();

    await injector.send();

    expect(commands.calls[0].args).toEqual(['-e', 'tell application "System Events" to key code 36']);
  });
});

describe('MacClipboard', () => {
  it('should pipe text into pbcopy', async () => {
    const commands = new ScriptedCommands();

    await new MacClipboard(commands.run).writeText('copied');

    expect(commands.calls).toEqual([{ command: 'pbcopy', args: [], options: { stdin: 'copied', timeoutMs: 2000 } }]);
  });
});
