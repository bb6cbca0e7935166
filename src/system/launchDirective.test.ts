import { describe, expect, it } from 'vitest';
import { toggleLaunchDirective } from './launchDirective';

const DIRECTIVE = 'exec --no-startup-id welcome-hello';

const CONFIG = [
  'set $mod Mod4',
  'exec --no-startup-id nm-applet',
  '#exec --no-startup-id welcome-hello',
  'bindsym $mod+Return exec terminal',
].join('\n');

describe('launchDirective.toggleLaunchDirective', () => {
  it('uncomments the directive when enabling', () => {
    expect(toggleLaunchDirective(CONFIG, DIRECTIVE, true)).toBe(
      [
        'set $mod Mod4',
        'exec --no-startup-id nm-applet',
        'exec --no-startup-id welcome-hello',
        'bindsym $mod+Return exec terminal',
      ].join('\n')
    );
  });

  it('comments the directive exactly once when disabling twice', () => {
    const enabled = toggleLaunchDirective(CONFIG, DIRECTIVE, true);
    const disabled = toggleLaunchDirective(enabled, DIRECTIVE, false);
    expect(disabled).toBe(CONFIG);
    expect(toggleLaunchDirective(disabled, DIRECTIVE, false)).toBe(CONFIG);
  });

  it('normalizes indented and repeatedly commented lines', () => {
    const content = '  ## exec --no-startup-id welcome-hello  \r\nexec_always foo\n';
    expect(toggleLaunchDirective(content, DIRECTIVE, true)).toBe(
      '  exec --no-startup-id welcome-hello\r\nexec_always foo\n'
    );
    expect(toggleLaunchDirective(content, DIRECTIVE, false)).toBe(
      '  #exec --no-startup-id welcome-hello\r\nexec_always foo\n'
    );
  });

  it('leaves lines that only start with the directive alone', () => {
    const content = 'exec --no-startup-id welcome-hello-extra\n';
    expect(toggleLaunchDirective(content, DIRECTIVE, false)).toBe(content);
  });

  it('leaves content without the directive unchanged', () => {
    const content = 'set $mod Mod4\n';
    expect(toggleLaunchDirective(content, DIRECTIVE, true)).toBe(content);
  });
});
