import { InvalidResourceError } from '../errors.js';
import { readResources, writeResources } from '../formats/android-xml.js';
import { Resource, ResourceTree } from '../formats/index.js';
import { PluralKeyword } from '../plurals/index.js';
import { MemoryLogger, resourcesXml } from './mocks.js';

const XLIFF = 'urn:oasis:names:tc:xliff:document:1.2';

describe('readResources', () => {
  it('should read strings, arrays and plurals in document order', () => {
    const xml = resourcesXml(`
    <!-- Greeting shown on start -->
    <string name="hello">Hello, World!</string>
    <string name="app_name" translatable="false">Example</string>
    <string-array name="colors">
        <item>Red</item>
        <item></item>
        <item>Blue</item>
    </string-array>
    <plurals name="files">
        <item quantity="other">%d files</item>
        <item quantity="one">%d file</item>
    </plurals>`);

    const tree = readResources(xml);

    expect([...tree.keys()]).toEqual(['hello', 'colors', 'files']);
    expect(tree.get('hello')).toEqual({
      kind: 'string',
      name: 'hello',
      text: 'Hello, World!',
      comment: 'Greeting shown on start',
    });
    expect(tree.get('colors')).toEqual({ kind: 'string-array', name: 'colors', items: ['Red', undefined, 'Blue'] });

    const files = tree.get('files');
    expect(files?.kind).toBe('plurals');
    if (files?.kind === 'plurals') {
      expect(files.forms.get('one')).toBe('%d file');
      expect(files.forms.get('other')).toBe('%d files');
    }
  });

  it('should decode entities and whitespace', () => {
    const xml = resourcesXml(`
    <string name="food">Fish &amp; Chips</string>
    <string name="spaced">
        Hello
        world
    </string>
    <string name="literal">&lt;b&gt;</string>`);

    const tree = readResources(xml);

    expect(tree.get('food')).toEqual({ kind: 'string', name: 'food', text: 'Fish & Chips' });
    expect(tree.get('spaced')).toEqual({ kind: 'string', name: 'spaced', text: 'Hello world' });
    expect(tree.get('literal')).toEqual({ kind: 'string', name: 'literal', text: '&lt;b&gt;' });
  });

  it('should keep nested markup as text', () => {
    const xml = resourcesXml('<string name="bold">Hello <b>bold</b> world</string>');

    expect(readResources(xml).get('bold')).toEqual({ kind: 'string', name: 'bold', text: 'Hello <b>bold</b> world' });
  });

  it('should normalize the xliff prefix', () => {
    const xml = resourcesXml(
      '<string name="welcome">Hi <x:g id="name">%s</x:g>!</string>',
      ` xmlns:x="${XLIFF}"`
    );

    expect(readResources(xml).get('welcome')).toEqual({
      kind: 'string',
      name: 'welcome',
      text: 'Hi <xliff:g id="name">%s</xliff:g>!',
    });
  });

  it('should inline declarations of other namespaces', () => {
    const xml = resourcesXml('<string name="custom">A <foo:em>b</foo:em></string>', ' xmlns:foo="urn:example:foo"');

    expect(readResources(xml).get('custom')).toEqual({
      kind: 'string',
      name: 'custom',
      text: 'A <foo:em xmlns:foo="urn:example:foo">b</foo:em>',
    });
  });

  it('should warn about duplicates and keep the first definition', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml(`
    <string name="hello">First</string>
    <string name="hello">Second</string>`);

    const tree = readResources(xml, logger);

    expect(tree.get('hello')).toEqual({ kind: 'string', name: 'hello', text: 'First' });
    expect(logger.warnings).toEqual(['Duplicate resource id found: hello, ignoring.']);
  });

  it('should skip resource references', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml('<string name="alias">@string/hello</string>');

    expect(readResources(xml, logger).size).toBe(0);
    expect(logger.warnings).toEqual(['Ignoring "alias": it is a resource reference (@string/hello)']);
  });

  it('should skip strings with a malformed unicode escape', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml(`
    <string name="bad">Oops \\uzz</string>
    <string name="good">Fine</string>`);

    const tree = readResources(xml, logger);

    expect([...tree.keys()]).toEqual(['good']);
    expect(logger.warnings).toEqual(['Ignoring "bad": bad unicode escape sequence "\\uzz"']);
  });

  it('should skip a plural when one of its quantities is a resource reference', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml(`
    <plurals name="songs">
        <item quantity="one">@string/one_song</item>
        <item quantity="other">%d songs</item>
    </plurals>
    <string name="title">Songs</string>`);

    const tree = readResources(xml, logger);

    expect([...tree.keys()]).toEqual(['title']);
    expect(logger.warnings).toEqual(['Ignoring "songs": it is a resource reference (@string/one_song)']);
  });

  it('should skip a plural when one of its quantities has a malformed escape', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml(`
    <plurals name="songs">
        <item quantity="one">One song</item>
        <item quantity="other">%d songs \\uzz</item>
    </plurals>`);

    expect(readResources(xml, logger).size).toBe(0);
    expect(logger.warnings).toEqual(['Ignoring "songs": bad unicode escape sequence "\\uzz"']);
  });

  it('should skip empty strings', () => {
    const xml = resourcesXml('<string name="empty">   </string>');

    expect(readResources(xml).size).toBe(0);
  });

  it('should warn about unknown plural quantities', () => {
    const logger = new MemoryLogger();
    const xml = resourcesXml(`
    <plurals name="files">
        <item quantity="one">%d file</item>
        <item quantity="several">%d files</item>
    </plurals>`);

    const files = readResources(xml, logger).get('files');

    expect(files?.kind === 'plurals' && [...files.forms.keys()]).toEqual(['one']);
    expect(logger.warnings).toEqual(['Plural "files" uses unknown quantity "several"; ignoring it']);
  });

  it('should throw on malformed XML', () => {
    expect(() => readResources('<resources><string name="a">x</resources>')).toThrow(InvalidResourceError);
  });

  it('should throw when the root element is not resources', () => {
    expect(() => readResources('<strings></strings>')).toThrow('missing <resources> root element');
  });
});

describe('writeResources', () => {
  it('should write a string with its comment', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['hello', { kind: 'string', name: 'hello', text: 'Hello', comment: 'Greeting' }],
    ]);

    expect(writeResources(tree)).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<resources>\n' +
        '    <!-- Greeting -->\n' +
        '    <string name="hello">Hello</string>\n' +
        '</resources>\n'
    );
  });

  it('should write arrays with holes and plurals in CLDR order', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['colors', { kind: 'string-array', name: 'colors', items: ['Red', undefined] }],
      [
        'files',
        {
          kind: 'plurals',
          name: 'files',
          forms: new Map<PluralKeyword, string>([
            ['other', '%d files'],
            ['one', '%d file'],
          ]),
        },
      ],
    ]);

    expect(writeResources(tree)).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        '<resources>\n' +
        '    <string-array name="colors">\n' +
        '        <item>Red</item>\n' +
        '        <item></item>\n' +
        '    </string-array>\n' +
        '    <plurals name="files">\n' +
        '        <item quantity="one">%d file</item>\n' +
        '        <item quantity="other">%d files</item>\n' +
        '    </plurals>\n' +
        '</resources>\n'
    );
  });

  it('should escape text around nested markup', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['promo', { kind: 'string', name: 'promo', text: "It's 100% <b>bold</b> & @me" }],
    ]);

    expect(writeResources(tree)).toContain('<string name="promo">It\\\'s 100% <b>bold</b> &amp; \\@me</string>');
  });

  it('should quote whitespace Android would otherwise lose', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['padded', { kind: 'string', name: 'padded', text: ' a  b' }],
    ]);

    expect(writeResources(tree)).toContain('<string name="padded">" a  b"</string>');
  });

  it('should keep escaped angle brackets as text', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['compare', { kind: 'string', name: 'compare', text: '1 &lt; 2' }],
    ]);

    expect(writeResources(tree)).toContain('<string name="compare">1 &lt; 2</string>');
  });

  it('should close tags left open and warn about it', () => {
    const logger = new MemoryLogger();
    const tree: ResourceTree = new Map<string, Resource>([
      ['broken', { kind: 'string', name: 'broken', text: 'Hello <b>world' }],
    ]);

    const xml = writeResources(tree, logger);

    expect(xml).toContain('<string name="broken">Hello <b>world</b></string>');
    expect(logger.warnings).toHaveLength(1);
    expect(logger.warnings[0]).toMatch(/^Message "broken" contains invalid XHTML/);
  });

  it('should declare the xliff namespace when it is used', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['welcome', { kind: 'string', name: 'welcome', text: 'Hi <xliff:g id="name">%s</xliff:g>' }],
    ]);

    expect(writeResources(tree)).toBe(
      '<?xml version="1.0" encoding="utf-8"?>\n' +
        `<resources xmlns:xliff="${XLIFF}">\n` +
        '    <string name="welcome">Hi <xliff:g id="name">%s</xliff:g></string>\n' +
        '</resources>\n'
    );
  });

  it('should write an empty document', () => {
    expect(writeResources(new Map())).toBe('<?xml version="1.0" encoding="utf-8"?>\n<resources></resources>\n');
  });

  it('should read back what it wrote', () => {
    const tree: ResourceTree = new Map<string, Resource>([
      ['quoted', { kind: 'string', name: 'quoted', text: 'Say "hi"\nthen  wait' }],
      ['markup', { kind: 'string', name: 'markup', text: 'Tap <b>here</b> to continue' }],
    ]);

    const roundTripped = readResources(writeResources(tree));

    expect(roundTripped.get('quoted')).toEqual(tree.get('quoted'));
    expect(roundTripped.get('markup')).toEqual(tree.get('markup'));
  });
});
