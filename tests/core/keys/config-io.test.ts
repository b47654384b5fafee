import { describe, expect, it } from 'vitest';
import {
  KEYS_FILE_INTRO,
  checkMissing,
  checkUndefined,
  dumpDefaults,
  fillMissing,
  fillMissingCode,
  loadBindings,
  saveBindings,
} from '../../../src/core/keys/config-io';
import { VKEY_COUNT } from '../../../src/core/keys/catalog';
import { KeyRegistry } from '../../../src/core/keys/registry';
import type { TextSink } from '../../../src/core/keys/types';
import { vkey } from '../../mocks/keys';

class StringSink implements TextSink {
  text = '';

  write(chunk: string): void {
    this.text += chunk;
  }
}

function dump(): string {
  const sink = new StringSink();
  dumpDefaults(sink);
  return sink.text;
}

const addItem = vkey('add-item');
const delItem = vkey('del-item');

describe('dumpDefaults', () => {
  it('writes the intro, a blank line and one record per action', () => {
    const text = dump();
    expect(text.startsWith(`${KEYS_FILE_INTRO}\ngeneric-cancel  ESC\ngeneric-select  SPC\n`)).toBe(true);
    expect(text.endsWith('raise-priority  +\nlower-priority  -\n')).toBe(true);
    expect(text.split('\n')).toHaveLength(7 + 1 + VKEY_COUNT + 1);
  });

  it('passes the intro through the translator', () => {
    const sink = new StringSink();
    dumpDefaults(sink, (message) => message.toUpperCase());
    expect(sink.text.startsWith('#\n# TERMKEYS KEYS CONFIGURATION FILE\n')).toBe(true);
    expect(sink.text).toContain('\ngeneric-quit  q Q\n');
  });
});

describe('loadBindings', () => {
  it('replays the defaults file without issues', () => {
    const registry = new KeyRegistry();
    expect(loadBindings(registry, dump())).toEqual([]);
    expect(checkMissing(registry)).toBe(false);
    expect(checkUndefined(registry)).toBe(false);
    expect(registry.all(vkey('generic-save'))).toBe('s S ^S');
    expect(registry.lookup(9)).toBe(vkey('generic-change-view'));
  });

  it('saves exactly what the defaults file holds once it is loaded', () => {
    const registry = new KeyRegistry();
    loadBindings(registry, dump());

    const sink = new StringSink();
    saveBindings(registry, sink);

    expect(sink.text).toBe(dump());
  });

  it('reports problem lines and keeps going', () => {
    const registry = new KeyRegistry();
    const issues = loadBindings(
      registry,
      [
        'bogus-action  a',
        'add-item  a',
        'add-item  b',
        'del-item  a ZZZ d',
        '# comment',
        '',
        'edit-item',
        'view-item  UNDEFINED',
      ].join('\n')
    );

    expect(issues).toEqual([
      {
        line: 1,
        reason: 'unknown-label',
        label: 'bogus-action',
        message: 'unknown action "bogus-action"',
      },
      {
        line: 3,
        reason: 'duplicate-label',
        label: 'add-item',
        message: '"add-item" is defined twice',
      },
      {
        line: 4,
        reason: 'conflict',
        label: 'del-item',
        token: 'a',
        message: 'key "a" for "del-item" is already bound to "add-item"',
      },
      {
        line: 4,
        reason: 'unknown-key',
        label: 'del-item',
        token: 'ZZZ',
        message: 'unknown key "ZZZ" for "del-item"',
      },
    ]);
    expect(registry.all(addItem)).toBe('a');
    expect(registry.all(delItem)).toBe('d');
    expect(registry.state(vkey('edit-item'))).toEqual({ _tag: 'Undefined' });
    expect(registry.state(vkey('view-item'))).toEqual({ _tag: 'Undefined' });
    expect(checkUndefined(registry)).toBe(true);
    expect(checkMissing(registry)).toBe(true);
  });

  it('skips a repeated label even when its first line bound nothing', () => {
    const registry = new KeyRegistry();
    const issues = loadBindings(registry, 'add-item  a\ndel-item  a\ndel-item  x\n');

    expect(issues.map((issue) => [issue.line, issue.reason])).toEqual([
      [2, 'conflict'],
      [3, 'duplicate-label'],
    ]);
    expect(registry.state(delItem)).toEqual({ _tag: 'Uninitialized' });
    expect(registry.lookup(120)).toBeNull();
  });

  it('reloads a cleared action as undefined', () => {
    const registry = new KeyRegistry();
    fillMissing(registry);
    registry.remove(97, addItem);
    registry.remove(65, addItem);

    const sink = new StringSink();
    saveBindings(registry, sink);
    expect(sink.text).toContain('\nadd-item  UNDEFINED\ndel-item  d D\n');

    const reloaded = new KeyRegistry();
    expect(loadBindings(reloaded, sink.text)).toEqual([]);

    expect(reloaded.state(addItem)).toEqual({ _tag: 'Undefined' });
    expect(reloaded.all(delItem)).toBe('d D');
    expect(checkUndefined(reloaded)).toBe(true);
    expect(checkMissing(reloaded)).toBe(false);

    expect(fillMissing(reloaded)).toEqual({ status: 'filled', count: 0 });
    expect(reloaded.state(addItem)).toEqual({ _tag: 'Undefined' });
    expect(reloaded.lookup(97)).toBeNull();
  });

  it('accepts CRLF line endings and legacy key names', () => {
    const registry = new KeyRegistry();
    expect(loadBindings(registry, 'view-item  ^J\r\nmove-left  KEY_HOME\r\n')).toEqual([]);
    expect(registry.all(vkey('view-item'))).toBe('RET');
    expect(registry.all(vkey('move-left'))).toBe('HOM');
  });
});

describe('fillMissing', () => {
  it('binds the defaults of every action on an empty registry', () => {
    const registry = new KeyRegistry();
    expect(fillMissing(registry)).toEqual({ status: 'filled', count: VKEY_COUNT });
    expect(checkMissing(registry)).toBe(false);
    expect(registry.all(vkey('view-item'))).toBe('v V RET');
  });

  it('skips actions that are bound or cleared', () => {
    const registry = new KeyRegistry();
    loadBindings(registry, 'add-item  UNDEFINED\ndel-item  z\n');

    expect(fillMissing(registry)).toEqual({ status: 'filled', count: VKEY_COUNT - 2 });
    expect(registry.all(addItem)).toBe('UNDEFINED');
    expect(registry.all(delItem)).toBe('z');
  });

  it('stops at the first default that is already taken', () => {
    const registry = new KeyRegistry();
    registry.assign(65, delItem);

    expect(fillMissing(registry)).toEqual({ status: 'conflict', index: addItem, label: 'add-item' });
    expect(registry.lookup(97)).toBe(addItem);
    expect(registry.lookup(65)).toBe(delItem);
  });

  it('encodes the result as a count or a negated index', () => {
    expect(fillMissingCode(new KeyRegistry())).toBe(VKEY_COUNT);

    const registry = new KeyRegistry();
    registry.assign(65, delItem);
    expect(fillMissingCode(registry)).toBe(-addItem);
  });
});

describe('saveBindings', () => {
  it('writes UNDEFINED for cleared and unconfigured actions', () => {
    const registry = new KeyRegistry();
    registry.assign(97, addItem);
    registry.assign(120, addItem);
    registry.markUndefined(delItem);

    const sink = new StringSink();
    saveBindings(registry, sink);

    expect(sink.text).toContain('\nadd-item  a x\ndel-item  UNDEFINED\nedit-item  UNDEFINED\n');
  });
});
