import { describe, it, expect } from 'vitest';
import { PatternTranslator, phrasebook_parse } from './PatternTranslator.js';
import { ResolutionError } from '../errors.js';

const translator: PatternTranslator = new PatternTranslator();

describe('PatternTranslator', (): void => {
    it.each([
        ['list files in current directory', 'dir'],
        ['create a folder called test', 'mkdir test'],
        ['delete the file hello.txt', 'del hello.txt'],
        ['show all running processes', 'tasklist'],
        ['check CPU usage', 'cpu'],
        ['how much memory is free', 'mem'],
        ['make a new file called notes.txt', 'touch notes.txt'],
        ['show the contents of notes.txt', 'type notes.txt'],
        ['list the contents of this folder', 'dir'],
        ['show files in docs', 'dir docs'],
        ['rename draft.txt to final.txt', 'ren draft.txt final.txt'],
        ['move report.txt into the archive folder', 'move report.txt archive'],
        ['copy notes.txt to archive', 'copy notes.txt archive'],
        ['kill process 4242', 'taskkill 4242'],
        ['stop the process named node', 'taskkill node'],
        ["print 'Good Morning'", 'echo Good Morning'],
        ['is example.com reachable', 'ping example.com'],
        ['go up one level', 'cd ..'],
        ['go to the folder projects', 'cd projects'],
        ['where am i', 'pwd'],
        ['show my ip address', 'ipconfig'],
        ['clear the screen', 'cls']
    ])('maps %j to %j', (text: string, expected: string): void => {
        expect(translator.command_derive(text)).toBe(expected);
    });

    it('returns null for text no rule maps', (): void => {
        expect(translator.command_derive('tell me a joke')).toBeNull();
        expect(translator.command_derive('create')).toBeNull();
    });

    it('skips rules whose command is not allowed', (): void => {
        expect(translator.command_derive('check CPU usage', new Set(['dir']))).toBeNull();
    });

    it('rejects unmappable text as Unrecognized', async (): Promise<void> => {
        const request = translator.translate({ text: 'tell me a joke', commands: ['dir'] }, new AbortController().signal);
        await expect(request).rejects.toBeInstanceOf(ResolutionError);
        await expect(request).rejects.toThrow("could not understand 'tell me a joke'");
    });

    it('answers through the boundary interface', async (): Promise<void> => {
        const reply = await translator.translate(
            { text: 'create a folder called test', commands: ['mkdir', 'touch'] },
            new AbortController().signal
        );
        expect(reply).toEqual({ command: 'mkdir test' });
    });
});

describe('phrasebook_parse', (): void => {
    it('rejects a rule with no trigger phrases', (): void => {
        const yamlStr: string = [
            'stopWords: []',
            'objectWords: [file]',
            'nameIndicators: [called]',
            'ignoredWords: []',
            'rules:',
            '  - command: dir',
            '    any: []'
        ].join('\n');
        expect(() => phrasebook_parse(yamlStr)).toThrow(/^Invalid phrasebook: \[rules\.0\.any\]/);
    });

    it('accepts a minimal phrasebook', (): void => {
        const book = phrasebook_parse([
            'stopWords: [the]',
            'objectWords: [file]',
            'nameIndicators: [called]',
            'ignoredWords: []',
            'rules:',
            '  - command: cpu',
            '    any: [processor]'
        ].join('\n'));
        expect(new PatternTranslator(book).command_derive('the processor')).toBe('cpu');
    });
});
