import { compile, compileWithVersion } from '../lib/grammar.library.js';
import { InvalidFormatDescription } from '../lib/error.library.js';
import type { Version } from '../lib/pattern.config/pattern.enum.js';
import type { Grammar } from '../lib/grammar.library.js';

const label = 'grammar:';

const year = { kind: 'year', padding: 'zero', repr: 'full', range: 'extended', base: 'calendar', sign: 'automatic' };
const month = { kind: 'month', padding: 'zero', repr: 'numerical', caseSensitive: true };
const day = { kind: 'day', padding: 'zero' };
const hour = { kind: 'hour', padding: 'zero', repr: '24' };

/** the InvalidFormatDescription that compile() throws */
function failure(source: string, version?: Version, options?: Grammar.Options) {
  try {
    compile(source, version, options);
  } catch (err) {
    if (err instanceof InvalidFormatDescription)
      return err;
    throw err;
  }
  throw new Error(`"${source}" should not compile`);
}

/**
 * Test the version 1 grammar
 */
describe(`${label}`, () => {

  test(`${label} components and literals`, () => {
    expect(compile('[year]-[month]-[day]')).toEqual([
      { type: 'component', component: year },
      { type: 'literal', value: '-' },
      { type: 'component', component: month },
      { type: 'literal', value: '-' },
      { type: 'component', component: day },
    ])
  })

  test(`${label} an empty description has no items`, () => {
    expect(compile('')).toEqual([]);
  })

  test(`${label} whitespace inside the brackets`, () => {
    expect(compile('[ year ]')).toEqual([{ type: 'component', component: year }]);
  })

  test(`${label} names, keys and values ignore case`, () => {
    expect(compile('[YEAR Repr:LAST_TWO]')).toEqual([
      { type: 'component', component: { ...year, repr: 'last_two' } },
    ])
  })

  test(`${label} the last of a repeated modifier wins`, () => {
    expect(compile('[day padding:space  padding:none]')).toEqual([
      { type: 'component', component: { kind: 'day', padding: 'none' } },
    ])
  })

  test(`${label} modifiers resolve to typed values`, () => {
    expect(compile('[weekday repr:sunday one_indexed:false case_sensitive:false][ignore count:5][end trailing_input:discard]')).toEqual([
      { type: 'component', component: { kind: 'weekday', repr: 'sunday', oneIndexed: false, caseSensitive: false } },
      { type: 'component', component: { kind: 'ignore', count: 5 } },
      { type: 'component', component: { kind: 'end', trailingInput: 'discard' } },
    ])
  })

  test(`${label} '[[' is a literal '['`, () => {
    expect(compile('[[')).toEqual([{ type: 'literal', value: '[' }]);
  })

  test(`${label} adjacent literals merge`, () => {
    expect(compile('foo[[bar')).toEqual([{ type: 'literal', value: 'foo[bar' }]);
  })

  test(`${label} a top-level ']' is literal text`, () => {
    expect(compile('a]b')).toEqual([{ type: 'literal', value: 'a]b' }]);
  })

  test(`${label} a backslash is literal text in version 1`, () => {
    expect(compile('\\a')).toEqual([{ type: 'literal', value: '\\a' }]);
  })

  test(`${label} multi-byte literals`, () => {
    expect(compile('é[day]')).toEqual([
      { type: 'literal', value: 'é' },
      { type: 'component', component: day },
    ])
  })

  test(`${label} compiled items are frozen`, () => {
    const items = compile('[year]-[month]');

    expect(Object.isFrozen(items)).toBe(true);
    expect(Object.isFrozen(items[0])).toBe(true);
  })

  test(`${label} compiling twice gives equal trees`, () => {
    expect(compile('[hour]:[minute] [period case:lower]'))
      .toEqual(compile('[hour]:[minute] [period case:lower]'));
  })

})

/**
 * Test the 'version = N,' directive
 */
describe(`${label} directive`, () => {

  test(`${label} selects the grammar version`, () => {
    const { items, version } = compileWithVersion('version = 2, [year]');

    expect(version).toBe(2);
    expect(items).toEqual([{ type: 'component', component: year }]);
  })

  test(`${label} whitespace is optional`, () => {
    expect(compileWithVersion('version=2,[year]').version).toBe(2);
  })

  test(`${label} overrides the default version`, () => {
    expect(compileWithVersion('version = 1, \\a', 2)).toEqual({
      items: [{ type: 'literal', value: '\\a' }],
      version: 1,
    })
  })

  test(`${label} without one, the default version applies`, () => {
    expect(compileWithVersion('[year]', 2).version).toBe(2);
    expect(compileWithVersion('[year]').version).toBe(1);
  })

  test(`${label} 'version' without '=' is literal text`, () => {
    expect(compile('versions [year]')).toEqual([
      { type: 'literal', value: 'versions ' },
      { type: 'component', component: year },
    ])
  })

  test(`${label} an unsupported version`, () => {
    expect(failure('version = 3, [year]')).toMatchObject({ kind: 'InvalidFormatDescriptionVersion', span: { start: 10, end: 11 } });
    expect(failure('version = 12, [year]')).toMatchObject({ kind: 'InvalidFormatDescriptionVersion', span: { start: 10, end: 12 } });
  })

  test(`${label} a version that is not a number`, () => {
    expect(failure('version = two, [year]')).toMatchObject({ kind: 'UnexpectedToken', span: { start: 10, end: 13 } });
    expect(failure('version =')).toMatchObject({ kind: 'UnexpectedToken', span: { start: 9, end: 9 } });
  })

  test(`${label} a missing comma`, () => {
    expect(failure('version = 2 [year]')).toMatchObject({ kind: 'UnexpectedToken', span: { start: 12, end: 13 } });
  })

})

/**
 * Test compile errors, and the byte span each one reports
 */
describe(`${label} errors`, () => {

  test(`${label} an unknown component`, () => {
    const error = failure('[foo]');

    expect(error).toMatchObject({ kind: 'InvalidComponent', span: { start: 1, end: 4 } });
    expect(error.message).toBe('InvalidComponent at byte 1..4: invalid component "foo"');
  })

  test(`${label} spans are byte offsets`, () => {
    expect(failure('é[foo]')).toMatchObject({ kind: 'InvalidComponent', span: { start: 3, end: 6 } });
  })

  test(`${label} a modifier the component does not take`, () => {
    expect(failure('[day sign:mandatory]')).toMatchObject({ kind: 'InvalidModifierKey', span: { start: 5, end: 9 } });
  })

  test(`${label} a modifier with no key`, () => {
    expect(failure('[day :mandatory]')).toMatchObject({ kind: 'InvalidModifierKey', span: { start: 5, end: 5 } });
  })

  test(`${label} a value the modifier does not take`, () => {
    expect(failure('[day padding:invalid]')).toMatchObject({ kind: 'InvalidModifierValue', span: { start: 13, end: 20 } });
  })

  test(`${label} a modifier with no value`, () => {
    expect(failure('[day bar]')).toMatchObject({ kind: 'ExpectedModifierValue', span: { start: 5, end: 8 } });
    expect(failure('[day sign:]')).toMatchObject({ kind: 'ExpectedModifierValue', span: { start: 10, end: 10 } });
  })

  test(`${label} a missing required modifier`, () => {
    expect(failure('[ignore]')).toMatchObject({ kind: 'MissingRequiredModifier', span: { start: 1, end: 7 } });
    expect(failure('version = 2, [ignore]')).toMatchObject({ kind: 'MissingRequiredModifier', span: { start: 14, end: 20 } });
  })

  test(`${label} a count out of range`, () => {
    expect(failure('[ignore count:70000]')).toMatchObject({ kind: 'InvalidModifierValue', span: { start: 14, end: 19 } });
    expect(failure('[ignore count:0]')).toMatchObject({ kind: 'InvalidModifierValue', span: { start: 14, end: 15 } });
  })

  test(`${label} a missing component name`, () => {
    expect(failure('[')).toMatchObject({ kind: 'MissingComponentName', span: { start: 1, end: 1 } });
    expect(failure('[]')).toMatchObject({ kind: 'MissingComponentName', span: { start: 1, end: 1 } });
    expect(failure('[ ')).toMatchObject({ kind: 'MissingComponentName', span: { start: 2, end: 2 } });
  })

  test(`${label} an unclosed bracket`, () => {
    expect(failure('[foo')).toMatchObject({ kind: 'UnclosedBracket', span: { start: 0, end: 1 } });
    expect(failure('[day sign:mandatory')).toMatchObject({ kind: 'UnclosedBracket', span: { start: 0, end: 1 } });
    expect(failure('[year [month]]')).toMatchObject({ kind: 'UnclosedBracket', span: { start: 0, end: 1 } });
  })

  test(`${label} nesting keywords are plain names in version 1`, () => {
    expect(failure('[optional [[year')).toMatchObject({ kind: 'UnclosedBracket', span: { start: 0, end: 1 } });
    expect(failure('[optional]')).toMatchObject({ kind: 'InvalidComponent', span: { start: 1, end: 9 } });
  })

})
