import { describe, it, expect } from 'vitest';
import { Sniffer, detectType, getMimeType } from '../../src/detect.js';
import { createSignatureTable } from '../../src/signatures.js';
import { MemorySource, type RawFileSource } from '../../src/source.js';
import { ReadError } from '../../src/errors.js';
import type { DetectionResult } from '../../src/types.js';
import { bytes, createTestPng, createTestZip, utf8 } from '../helpers/samples.js';

const CFB_MAGIC = [0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1];

describe('Sniffer.detect', () => {
  const sniffer = new Sniffer();

  describe('binary signatures', () => {
    it('should detect PNG', () => {
      expect(sniffer.detect(createTestPng())).toEqual({
        detectedExt: 'png',
        detectedMime: 'image/png',
        confidence: 1,
        basis: 'signature:png',
      });
    });

    it('should report the canonical extension', () => {
      const result = sniffer.detect(bytes([0xff, 0xd8, 0xff, 0xe0]), { declaredExt: 'jpeg' });
      expect(result.detectedExt).toBe('jpg');
      expect(result.detectedMime).toBe('image/jpeg');
    });

    it('should only look at the sniff window', () => {
      const data = new Uint8Array(sniffer.table.maxWindow + 8);
      data.set(createTestPng().subarray(0, 8), sniffer.table.maxWindow);
      expect(sniffer.detect(data).detectedExt).toBe('bin');
    });
  });

  describe('ZIP containers', () => {
    it('should name an Office document from its entries', () => {
      const result = sniffer.detect(createTestZip(['[Content_Types].xml', 'word/document.xml']));
      expect(result).toEqual({
        detectedExt: 'docx',
        detectedMime: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
        confidence: 0.95,
        basis: 'zip-entry:docx',
      });
    });

    it('should prefer apk over jar when both indicators are present', () => {
      expect(sniffer.detect(createTestZip(['META-INF/MANIFEST.MF', 'classes.dex'])).detectedExt).toBe('apk');
      expect(sniffer.detect(createTestZip(['META-INF/MANIFEST.MF'])).detectedExt).toBe('jar');
    });

    it('should trust a declared extension that belongs to the container', () => {
      const result = sniffer.detect(createTestZip(['readme.txt']), { declaredExt: '.XLSX' });
      expect(result.detectedExt).toBe('xlsx');
      expect(result.confidence).toBe(0.9);
      expect(result.basis).toBe('zip-extension:xlsx');
    });

    it('should stay generic without any indicator', () => {
      const data = createTestZip(['readme.txt']);
      for (const declaredExt of ['zip', 'txt', '']) {
        expect(sniffer.detect(data, { declaredExt })).toEqual({
          detectedExt: 'zip',
          detectedMime: 'application/zip',
          confidence: 1,
          basis: 'signature:zip',
        });
      }
    });

    it('should let entry names win over the declared extension', () => {
      const result = sniffer.detect(createTestZip(['ppt/slides/slide1.xml']), { declaredExt: 'docx' });
      expect(result.detectedExt).toBe('pptx');
    });
  });

  describe('compound files', () => {
    const data = bytes(CFB_MAGIC, new Array<number>(504).fill(0));

    it('should use a declared legacy Office extension', () => {
      const result = sniffer.detect(data, { declaredExt: 'doc' });
      expect(result.detectedExt).toBe('doc');
      expect(result.basis).toBe('cfb-extension:doc');
    });

    it('should stay generic otherwise', () => {
      const result = sniffer.detect(data, { declaredExt: 'bin' });
      expect(result.detectedExt).toBe('cfb');
      expect(result.confidence).toBe(1);
    });
  });

  describe('text heuristics', () => {
    it('should detect JSON that parses', () => {
      expect(sniffer.detect(utf8('  {"a": [1, 2]}\n'))).toEqual({
        detectedExt: 'json',
        detectedMime: 'application/json',
        confidence: 0.7,
        basis: 'json-heuristic',
      });
    });

    it('should not call a complete file JSON when it does not parse', () => {
      const result = sniffer.detect(utf8('{"a": '));
      expect(result.detectedExt).toBe('txt');
      expect(result.basis).toBe('text-heuristic');
    });

    it('should accept unparseable JSON when the file continues past the window', () => {
      expect(sniffer.detect(utf8('{"a": '), { complete: false }).detectedExt).toBe('json');
    });

    it('should detect HTML by doctype', () => {
      const result = sniffer.detect(utf8('<!DOCTYPE html>\n<html><body>hi</body></html>'));
      expect(result.detectedExt).toBe('html');
      expect(result.confidence).toBe(0.6);
      expect(result.basis).toBe('html-heuristic');
    });

    it('should detect an HTML fragment by its opening tag', () => {
      expect(sniffer.detect(utf8('<div class="x">hello</div>')).detectedExt).toBe('html');
    });

    it('should read legacy-encoded HTML as ASCII', () => {
      const data = bytes('<html><body>caf', [0xe9], '</body></html>');
      expect(sniffer.detect(data).detectedExt).toBe('html');
    });

    it('should detect XML', () => {
      const result = sniffer.detect(utf8('<?xml version="1.0"?>\n<note>hi</note>'));
      expect(result.detectedExt).toBe('xml');
      expect(result.basis).toBe('xml-heuristic');
    });

    it('should detect SVG with or without a prologue', () => {
      const svg = '<svg xmlns="http://www.w3.org/2000/svg"><rect/></svg>';
      expect(sniffer.detect(utf8(svg)).detectedExt).toBe('svg');
      expect(sniffer.detect(utf8(`<?xml version="1.0"?>\n${svg}`)).detectedExt).toBe('svg');
      expect(sniffer.detect(utf8(svg)).detectedMime).toBe('image/svg+xml');
    });

    it('should keep an SVG with a title element out of HTML', () => {
      const svg =
        '<?xml version="1.0"?>\n<svg xmlns="http://www.w3.org/2000/svg"><title>Logo</title><rect/></svg>';
      const result = sniffer.detect(utf8(svg), { declaredExt: 'svg' });
      expect(result.detectedExt).toBe('svg');
      expect(result.basis).toBe('svg-heuristic');
    });

    it('should detect an RSS feed as XML', () => {
      const rss =
        '<?xml version="1.0" encoding="UTF-8"?>\n<rss version="2.0"><channel><title>News</title>' +
        '<link>https://example.com/</link><description>a</description></channel></rss>';
      expect(sniffer.detect(utf8(rss), { declaredExt: 'rss' }).detectedExt).toBe('xml');
    });

    it('should only use the first tag to recognise an HTML fragment', () => {
      expect(sniffer.detect(utf8('<note><title>hi</title></note>')).detectedExt).toBe('txt');
    });

    it('should not take a log that opens with a bracketed date for JSON', () => {
      const log = utf8('[2024-01-01 12:00:00] INFO started\n');
      expect(sniffer.detect(log, { complete: false }).detectedExt).toBe('txt');
      expect(sniffer.detect(utf8('[1, 2'), { complete: false }).detectedExt).toBe('json');
      expect(sniffer.detect(utf8('[ {"id": 1'), { complete: false }).detectedExt).toBe('json');
    });

    it('should read text starting with short magic letters as text', () => {
      const bmw = sniffer.detect(utf8('BMW service log\noil changed\n'), { declaredExt: 'txt' });
      expect(bmw.detectedExt).toBe('txt');
      expect(sniffer.detect(utf8('MZ-Kart notes\nlap times follow\n')).detectedExt).toBe('txt');
    });

    it('should detect plain text', () => {
      expect(sniffer.detect(utf8('hello world\n'))).toEqual({
        detectedExt: 'txt',
        detectedMime: 'text/plain',
        confidence: 0.4,
        basis: 'text-heuristic',
      });
    });

    it('should ignore a byte order mark', () => {
      expect(sniffer.detect(bytes([0xef, 0xbb, 0xbf], '{"ok": true}')).detectedExt).toBe('json');
    });

    it('should not call mostly-control text plain text', () => {
      expect(sniffer.detect(bytes('ab', [0x01, 0x02, 0x03])).detectedExt).toBe('bin');
    });
  });

  describe('window edge', () => {
    // "abcdefg€" is ten bytes; an 8-byte window cuts the euro sign
    const small = new Sniffer({ table: createSignatureTable([], { maxWindow: 8 }) });
    const data = utf8('abcdefg€');

    it('should ignore a code point cut by the window', () => {
      expect(small.detect(data).detectedExt).toBe('txt');
    });

    it('should reject the same bytes when they are the whole file', () => {
      expect(small.detect(data.subarray(0, 8)).detectedExt).toBe('bin');
    });
  });

  describe('fallback', () => {
    it('should return bin with zero confidence for binary noise', () => {
      expect(sniffer.detect(bytes([0x00, 0x01, 0x02, 0xff]))).toEqual({
        detectedExt: 'bin',
        detectedMime: 'application/octet-stream',
        confidence: 0,
        basis: 'no-signal',
      });
    });

    it('should return bin for an empty file', () => {
      const result = sniffer.detect(new Uint8Array(0));
      expect(result.detectedExt).toBe('bin');
      expect(result.confidence).toBe(0);
    });
  });

  it('should be deterministic and return frozen results', () => {
    const data = createTestZip(['xl/workbook.xml']);
    const first = sniffer.detect(data);
    expect(sniffer.detect(data)).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
  });

  it('should run a custom classifier chain in order', () => {
    const custom: DetectionResult = {
      detectedExt: 'png',
      detectedMime: 'image/png',
      confidence: 0.5,
      basis: 'custom',
    };
    const seen: string[] = [];
    const chained = new Sniffer({
      classifiers: [
        (_data, context) => {
          seen.push(context.declaredExt);
          return undefined;
        },
        () => custom,
        () => {
          throw new Error('should not run');
        },
      ],
    });
    expect(chained.detect(utf8('x'), { declaredExt: '.TXT' })).toBe(custom);
    expect(seen).toEqual(['txt']);
    expect(new Sniffer({ classifiers: [] }).detect(createTestPng()).detectedExt).toBe('bin');
  });
});

describe('Sniffer.detectSource', () => {
  const sniffer = new Sniffer();

  it('should read the prefix and pass the declared extension', async () => {
    const result = await sniffer.detectSource(new MemorySource('in/report.docx', createTestZip(['readme.txt'])));
    expect(result.detectedExt).toBe('docx');
    expect(result.basis).toBe('zip-extension:docx');
  });

  it('should treat a file larger than the window as incomplete', async () => {
    const small = new Sniffer({ table: createSignatureTable([], { maxWindow: 8 }) });
    const result = await small.detectSource(new MemorySource('notes.md', utf8('abcdefg€')));
    expect(result.detectedExt).toBe('txt');
  });

  it('should wrap read failures in ReadError', async () => {
    const broken: RawFileSource = {
      path: 'gone.jpg',
      extension: () => 'jpg',
      size: async () => 10,
      readPrefix: async () => {
        throw new Error('EIO: i/o error');
      },
    };
    await expect(sniffer.detectSource(broken)).rejects.toBeInstanceOf(ReadError);
    await expect(sniffer.detectSource(broken)).rejects.toThrow('Cannot read gone.jpg: EIO: i/o error');
    await expect(sniffer.detectSource(broken)).rejects.toHaveProperty('path', 'gone.jpg');
  });
});

describe('detectType / getMimeType', () => {
  it('should use the built-in tables', () => {
    expect(detectType(createTestPng()).detectedExt).toBe('png');
    expect(detectType(createTestZip(['readme.txt']), 'odt').detectedExt).toBe('odt');
    expect(getMimeType('JPEG')).toBe('image/jpeg');
    expect(getMimeType('unknown')).toBe('application/octet-stream');
  });
});
