import { compile } from '../lib/grammar.library.js';
import { parse, parsePrefix } from '../lib/parse.library.js';
import { ParseFromDescriptionError } from '../lib/error.library.js';
import { toBytes } from '../lib/cursor.class.js';

const label = 'parse:';

/** parse {text} against a description, as plain fields */
const fields = (description: string, text: string) =>
  parse(compile(description, 2), text).toObject();

/** the ParseFromDescriptionError that parse() throws */
function failure(description: string, text: string) {
  try {
    parse(compile(description, 2), text);
  } catch (err) {
    if (err instanceof ParseFromDescriptionError)
      return err;
    throw err;
  }
  throw new Error(`"${text}" should not parse`);
}

/**
 * Test the parse interpreter
 */
describe(`${label}`, () => {

  test(`${label} a calendar date`, () => {
    expect(fields('[year]-[month]-[day]', '2024-03-07')).toEqual({ year: 2024, month: 3, day: 7 });
  })

  test(`${label} bytes as well as text`, () => {
    expect(parse(compile('[day]'), toBytes('07')).get('day')).toBe(7);
  })

  test(`${label} a literal that does not match`, () => {
    expect(failure('[year]-[month]', '2024/03')).toMatchObject({ kind: 'InvalidLiteral', offset: 4 });
  })

  test(`${label} multi-byte literals advance by bytes`, () => {
    expect(fields('[day]é[month]', '07é03')).toEqual({ day: 7, month: 3 });
    expect(failure('[day]é[month]', '07é3x')).toMatchObject({ kind: 'InvalidComponentValue', offset: 4, component: 'month' });
  })

  test(`${label} parsePrefix reports what was consumed`, () => {
    expect(parsePrefix(compile('[day]'), '07xyz')).toMatchObject({ consumed: 2, remaining: 3 });
  })

})

describe(`${label} padding`, () => {

  test(`${label} zero padding needs every digit`, () => {
    expect(fields('[day]', '07')).toEqual({ day: 7 });
    expect(failure('[day]', '7')).toMatchObject({ kind: 'InvalidComponentValue', offset: 0, component: 'day' });
  })

  test(`${label} space padding`, () => {
    expect(fields('[day padding:space]', ' 7')).toEqual({ day: 7 });
    expect(fields('[day padding:space]', '17')).toEqual({ day: 17 });
  })

  test(`${label} no padding`, () => {
    expect(fields('[day padding:none]', '7')).toEqual({ day: 7 });
    expect(fields('[day padding:none]/[month padding:none]', '7/3')).toEqual({ day: 7, month: 3 });
  })

  test(`${label} values are range-checked`, () => {
    expect(failure('[day]', '32')).toMatchObject({ kind: 'InvalidComponentValue', component: 'day' });
    expect(failure('[month]', '13')).toMatchObject({ kind: 'InvalidComponentValue', component: 'month' });
    expect(failure('[hour]', '24')).toMatchObject({ kind: 'InvalidComponentValue', component: 'hour' });
    expect(failure('[hour repr:12]', '00')).toMatchObject({ kind: 'InvalidComponentValue', component: 'hour' });
  })

})

describe(`${label} names`, () => {

  test(`${label} month names`, () => {
    expect(fields('[month repr:short]', 'Mar')).toEqual({ month: 3 });
    expect(fields('[month repr:long]', 'December')).toEqual({ month: 12 });
  })

  test(`${label} names are case-sensitive by default`, () => {
    expect(failure('[month repr:short]', 'mar')).toMatchObject({ kind: 'InvalidComponentValue', offset: 0, component: 'month' });
    expect(fields('[month repr:short case_sensitive:false]', 'mAR')).toEqual({ month: 3 });
  })

  test(`${label} weekday names and numbers`, () => {
    expect(fields('[weekday]', 'Thursday')).toEqual({ weekday: 4 });
    expect(fields('[weekday repr:short]', 'Sun')).toEqual({ weekday: 7 });
    expect(fields('[weekday repr:sunday]', '1')).toEqual({ weekday: 7 });
    expect(fields('[weekday repr:sunday one_indexed:false]', '1')).toEqual({ weekday: 1 });
    expect(fields('[weekday repr:monday one_indexed:false]', '0')).toEqual({ weekday: 1 });
    expect(failure('[weekday repr:monday]', '8')).toMatchObject({ kind: 'InvalidComponentValue', component: 'weekday' });
  })

  test(`${label} the period`, () => {
    expect(fields('[hour repr:12]:[minute] [period]', '01:05 PM')).toEqual({ hour12: 1, minute: 5, hour12IsPm: true });
    expect(fields('[period case:lower]', 'am')).toEqual({ hour12IsPm: false });
    expect(failure('[period]', 'pm')).toMatchObject({ kind: 'InvalidComponentValue', component: 'period' });
    expect(fields('[period case_sensitive:false]', 'pm')).toEqual({ hour12IsPm: true });
  })

})

describe(`${label} numbers`, () => {

  test(`${label} signed and extended years`, () => {
    expect(fields('[year]', '+12345')).toEqual({ year: 12_345 });
    expect(fields('[year]', '-0044')).toEqual({ year: -44 });
    expect(fields('[year]', '-0000')).toEqual({ year: 0 });
    expect(failure('[year sign:mandatory]', '2024')).toMatchObject({ kind: 'InvalidComponentValue', component: 'year' });
  })

  test(`${label} partial years`, () => {
    expect(fields('[year repr:century][year repr:last_two]', '2024')).toEqual({ yearCentury: 20, yearCenturyIsNegative: false, yearLastTwo: 24 });
    expect(fields('[year repr:century]/[year repr:last_two]', '-00/05')).toEqual({ yearCentury: 0, yearCenturyIsNegative: true, yearLastTwo: 5 });
    expect(fields('[year base:iso_week repr:last_two]', '20')).toEqual({ isoYearLastTwo: 20 });
  })

  test(`${label} week numbers`, () => {
    expect(fields('[week_number]', '53')).toEqual({ isoWeekNumber: 53 });
    expect(fields('[week_number repr:sunday]', '00')).toEqual({ sundayWeekNumber: 0 });
    expect(failure('[week_number]', '00')).toMatchObject({ kind: 'InvalidComponentValue', component: 'week_number' });
  })

  test(`${label} subsecond digits`, () => {
    expect(fields('[second].[subsecond]', '05.12')).toEqual({ second: 5, subsecond: 120_000_000 });
    expect(fields('[subsecond]', '123456789123')).toEqual({ subsecond: 123_456_789 });
    expect(fields('[subsecond digits:3]', '120')).toEqual({ subsecond: 120_000_000 });
    expect(failure('[subsecond digits:3]', '12')).toMatchObject({ kind: 'InvalidComponentValue', component: 'subsecond' });
  })

  test(`${label} UTC offsets`, () => {
    expect(fields('[offset_hour]:[offset_minute]', '-05:30')).toEqual({ offsetHour: -5, offsetIsNegative: true, offsetMinute: 30 });
    expect(fields('[offset_hour]:[offset_minute]', '-00:30')).toEqual({ offsetHour: 0, offsetIsNegative: true, offsetMinute: 30 });
    expect(fields('[offset_hour]', '09')).toEqual({ offsetHour: 9, offsetIsNegative: false });
    expect(failure('[offset_hour sign:mandatory]', '09')).toMatchObject({ kind: 'InvalidComponentValue', component: 'offset_hour' });
  })

  test(`${label} unix timestamps`, () => {
    expect(fields('[unix_timestamp]', '1700000000')).toEqual({ unixTimestampNanos: 1_700_000_000_000_000_000n });
    expect(fields('[unix_timestamp]', '-1')).toEqual({ unixTimestampNanos: -1_000_000_000n });
    expect(fields('[unix_timestamp precision:millisecond]', '1500')).toEqual({ unixTimestampNanos: 1_500_000_000n });
    expect(failure('[unix_timestamp]', 'x')).toMatchObject({ kind: 'InvalidComponentValue', offset: 0, component: 'unix_timestamp' });
  })

})

describe(`${label} ignore and end`, () => {

  test(`${label} ignore skips a count of bytes`, () => {
    expect(fields('[ignore count:3][day]', 'abc07')).toEqual({ day: 7 });
    expect(failure('[ignore count:3]', 'ab')).toMatchObject({ kind: 'InvalidComponentValue', offset: 0, component: 'ignore' });
  })

  test(`${label} end rejects trailing input`, () => {
    expect(fields('[day][end]', '07')).toEqual({ day: 7 });
    expect(failure('[day][end]', '07x')).toMatchObject({ kind: 'UnexpectedTrailingCharacters', offset: 2 });
  })

  test(`${label} end may discard trailing input`, () => {
    const { parsed, consumed } = parsePrefix(compile('[day][end trailing_input:discard]'), '07xyz');

    expect(parsed.toObject()).toEqual({ day: 7 });
    expect(consumed).toBe(5);
  })

})

describe(`${label} groups`, () => {

  test(`${label} an optional group that matches`, () => {
    expect(fields('[hour][optional [:[minute]]]', '09:30')).toEqual({ hour24: 9, minute: 30 });
  })

  test(`${label} an optional group that is absent`, () => {
    expect(fields('[hour][optional [:[minute]]]', '09')).toEqual({ hour24: 9 });
  })

  test(`${label} a failed optional group leaves no fields behind`, () => {
    const { parsed, consumed } = parsePrefix(compile('[hour][optional [:[minute]:[second]]]', 2), '09:30');

    expect(parsed.toObject()).toEqual({ hour24: 9 });
    expect(consumed).toBe(2);
  })

  test(`${label} the first alternative to match wins`, () => {
    expect(fields('[first [[hour]] [[hour repr:12]]]', '13')).toEqual({ hour24: 13 });
    expect(fields('[first [[hour]] [[hour repr:12]]]', '09')).toEqual({ hour24: 9 });
  })

  test(`${label} a later alternative, when earlier ones fail`, () => {
    expect(fields('[first [[hour]h] [[hour repr:12]x]]', '09x')).toEqual({ hour12: 9 });
  })

  test(`${label} no alternative matches`, () => {
    expect(failure('[first [[hour]h] [[hour repr:12]x]]', '09y')).toMatchObject({ kind: 'InvalidLiteral', offset: 2 });
  })

  test(`${label} a field set twice must agree`, () => {
    expect(fields('[day]/[day]', '07/07')).toEqual({ day: 7 });
    expect(failure('[day]/[day]', '07/08')).toMatchObject({ kind: 'InconsistentParsedField', offset: 3, component: 'day' });
  })

})
