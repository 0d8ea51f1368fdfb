/**
 * Tests for the tree registry: registration, search and rendering
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BoundCommand, bindCommand } from '../src/command/bound-command.js';
import { ConfigErrorCode, ConfigurationError } from '../src/errors.js';
import { CommandTree, type GroupHandle } from '../src/tree/command-tree.js';

function command(names: string, description: string): BoundCommand {
  return bindCommand({ names, description, execute: () => names });
}

describe('CommandTree', () => {
  let tree: CommandTree;
  let textutils: GroupHandle;
  let metrics: GroupHandle;
  let countChars: BoundCommand;
  let countWords: BoundCommand;

  beforeEach(() => {
    tree = new CommandTree('Test console');
    textutils = tree.addGroup(tree.root, 'textutils|tu', 'some useful text utils');
    metrics = tree.addGroup(textutils, ['metrics', 'metr', 'mt'], 'calculate various string metrics');
    countChars = command('countchars|cc', 'count characters in a word');
    countWords = command('countwords|cw', 'count words');
    tree.addCommand(metrics, countChars);
    tree.addCommand(metrics, countWords);
    tree.addCommand(textutils, countWords);
    tree.addCommand(tree.root, command('help|h', 'show help'));
  });

  describe('handles', () => {
    it('should hand out frozen group handles', () => {
      expect(textutils).toEqual({ kind: 'group', id: 1 });
      expect(Object.isFrozen(textutils)).toBe(true);
      expect(tree.root).toEqual({ kind: 'group', id: 0 });
    });

    it('should keep one handle for a command attached twice', () => {
      const other = tree.addGroup(tree.root, 'fr', 'frequently used commands');

      expect(tree.addCommand(other, countChars)).toBe(tree.addCommand(tree.addGroup(other, 'more', 'more'), countChars));
    });

    it('should reject handles of another tree', () => {
      const other = new CommandTree('Other');
      other.addGroup(other.root, 'x', 'x');
      const foreign = other.addGroup(other.root, 'y', 'y');

      expect(() => tree.addGroup(foreign, 'y', 'y')).toThrow(
        expect.objectContaining({ code: ConfigErrorCode.INVALID_HANDLE })
      );
    });

    it('should reject an empty root description', () => {
      expect(() => new CommandTree(' ')).toThrow('Root command group description is invalid (empty).');
    });
  });

  describe('registration', () => {
    it('should reject an alias already used by a sibling command', () => {
      expect(() => tree.addGroup(textutils, 'cw', 'clashing group')).toThrow(
        'Can not add group. Child element named "cw" already exists in "textutils|tu" group.'
      );
    });

    it('should reject an alias already used by a sibling group', () => {
      expect(() => tree.addCommand(textutils, command('metrics', 'clashing command'))).toThrow(
        'Can not add command. One of child element names "metrics" already exists in "textutils|tu" group.'
      );
    });

    it('should reject attaching the same command twice to one group', () => {
      expect(() => tree.addCommand(textutils, countWords)).toThrow(ConfigurationError);
    });

    it('should reject a group alias already used by another group', () => {
      tree.addGroup(tree.root, 'a|b', 'first group');

      expect(() => tree.addGroup(tree.root, 'b', 'second group')).toThrow(
        expect.objectContaining({
          code: ConfigErrorCode.NAME_COLLISION,
          message: 'Can not add group. Child element named "b" already exists in "root" group.',
        })
      );
    });

    it('should reject two different commands sharing an alias in one group', () => {
      const wordCount = command('wordcount|cw', 'count words again');

      expect(() => tree.addCommand(metrics, wordCount)).toThrow(
        expect.objectContaining({
          code: ConfigErrorCode.NAME_COLLISION,
          message: 'Can not add command. One of child element names "cw" already exists in "metrics|metr|mt" group.',
        })
      );
      expect(tree.search('tu mt wordcount')).toEqual({ kind: 'nothing' });
    });

    it('should insert none of the aliases when one collides', () => {
      expect(() => tree.addGroup(textutils, 'fresh|cw', 'partly clashing group')).toThrow(ConfigurationError);
      expect(tree.search('tu fresh')).toEqual({ kind: 'nothing' });
    });

    it('should allow the same alias in different groups', () => {
      expect(tree.search('tu cw')).toMatchObject({ kind: 'command', command: countWords });
      expect(tree.search('tu mt cw')).toMatchObject({ kind: 'command', command: countWords });
    });
  });

  describe('resolveGroup', () => {
    it('should resolve paths and handles to groups', () => {
      expect(tree.resolveGroup('tu metr')).toBe(metrics);
      expect(tree.resolveGroup('')).toBe(tree.root);
      expect(tree.resolveGroup(textutils)).toBe(textutils);
    });

    it('should refuse a path that ends at a command', () => {
      expect(() => tree.resolveGroup('tu mt cc', 'group "extra"')).toThrow(
        'Can not add group "extra" at a given path "tu mt cc". Path points to an existing command, but should point to an existing group.'
      );
    });

    it('should refuse a path that leads nowhere', () => {
      expect(() => tree.resolveGroup('tu nope', 'group "extra"')).toThrow(
        expect.objectContaining({
          code: ConfigErrorCode.INVALID_PATH,
          message: 'Can not add group "extra" at a given path "tu nope". Path is invalid.',
        })
      );
    });
  });

  describe('search', () => {
    it('should find a command and keep the rest of the line', () => {
      expect(tree.search('TU  MT cc  some text')).toEqual({
        kind: 'command',
        command: countChars,
        handle: { kind: 'command', id: 0 },
        remainder: '  some text',
      });
    });

    it('should stop at a group when the line ends', () => {
      expect(tree.search('textutils metrics')).toEqual({ kind: 'group', group: metrics });
      expect(tree.search('tu ')).toEqual({ kind: 'group', group: textutils });
    });

    it('should return the root for a blank line', () => {
      expect(tree.search('  ')).toEqual({ kind: 'group', group: tree.root });
    });

    it('should report unknown tokens', () => {
      expect(tree.search('xyz')).toEqual({ kind: 'nothing' });
      expect(tree.search('tu xyz cc')).toEqual({ kind: 'nothing' });
    });

    it('should search below a given group', () => {
      expect(tree.search('cc', metrics)).toMatchObject({ kind: 'command', command: countChars, remainder: '' });
    });
  });

  describe('renderTree', () => {
    it('should draw the whole tree once per child', () => {
      expect(tree.renderTree()).toEqual([
        'Test console',
        '├──<textutils|tu: some useful text utils>',
        '│  ├──<metrics|metr|mt: calculate various string metrics>',
        '│  │  ├──"countchars|cc" - count characters in a word',
        '│  │  └──"countwords|cw" - count words',
        '│  └──"countwords|cw" - count words',
        '└──"help|h" - show help',
      ]);
    });

    it('should draw a subtree with its names on the first line', () => {
      expect(tree.renderTree(metrics)).toEqual([
        '<metrics|metr|mt: calculate various string metrics>',
        '├──"countchars|cc" - count characters in a word',
        '└──"countwords|cw" - count words',
      ]);
    });

    it('should use blank continuation lines below the last group', () => {
      const plain = new CommandTree('root');
      plain.addGroup(plain.root, 'first', 'first group');
      const second = plain.addGroup(plain.root, 'second', 'second group');
      plain.addCommand(second, command('inner', 'inner command'));

      expect(plain.renderTree()).toEqual([
        'root',
        '├──<first: first group>',
        '└──<second: second group>',
        '   └──"inner" - inner command',
      ]);
    });

    it('should reuse the rendering until the tree changes', () => {
      const before = tree.renderTree(textutils);

      expect(tree.renderTree(textutils)).toBe(before);

      tree.addCommand(textutils, command('late', 'added later'));
      const after = tree.renderTree(textutils);

      expect(after).not.toBe(before);
      expect(after[after.length - 1]).toBe('└──"late" - added later');
    });
  });
});
