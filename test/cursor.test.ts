import { Cursor, toBytes, byteLength, isDigit, isWhitespace } from '../lib/cursor.class.js';

const label = 'cursor:';

/**
 * Test the byte Cursor
 */
describe(`${label}`, () => {

  test(`${label} starts at zero, over UTF-8 bytes`, () => {
    const cursor = new Cursor('aé');

    expect(cursor.offset).toBe(0);
    expect(cursor.bytes.length).toBe(3);
    expect(cursor.remaining).toBe(3);
    expect(cursor.done).toBe(false);
  })

  test(`${label} peek does not consume`, () => {
    const cursor = new Cursor('ab');

    expect(cursor.peek()).toBe(0x61);
    expect(cursor.peek(1)).toBe(0x62);
    expect(cursor.peek(2)).toBeUndefined();
    expect(cursor.offset).toBe(0);
  })

  test(`${label} advance is clamped to the end`, () => {
    const cursor = new Cursor('abc');

    cursor.advance(2);
    expect(cursor.offset).toBe(2);
    cursor.advance(10);
    expect(cursor.offset).toBe(3);
    expect(cursor.done).toBe(true);
  })

  test(`${label} eat consumes only a matching byte`, () => {
    const cursor = new Cursor('[x');

    expect(cursor.eat(0x5d)).toBe(false);
    expect(cursor.eat(0x5b)).toBe(true);
    expect(cursor.offset).toBe(1);
  })

  test(`${label} take returns the length of the run`, () => {
    const cursor = new Cursor('2024-03');

    expect(cursor.take(isDigit)).toBe(4);
    expect(cursor.offset).toBe(4);
    expect(cursor.take(isDigit)).toBe(0);
  })

  test(`${label} take stops at {max}`, () => {
    const cursor = new Cursor('123456');

    expect(cursor.take(isDigit, 2)).toBe(2);
    expect(cursor.slice(0, cursor.offset)).toBe('12');
  })

  test(`${label} startsWith, with and without case folding`, () => {
    const cursor = new Cursor('March 7');

    expect(cursor.startsWith(toBytes('Mar'))).toBe(true);
    expect(cursor.startsWith(toBytes('mar'))).toBe(false);
    expect(cursor.startsWith(toBytes('mar'), false)).toBe(true);
    expect(cursor.startsWith(toBytes('March 7 2024'))).toBe(false);
  })

  test(`${label} snapshot and restore`, () => {
    const cursor = new Cursor('abcdef');
    cursor.advance(2);

    const mark = cursor.snapshot();
    cursor.advance(3);
    expect(cursor.offset).toBe(5);

    cursor.restore(mark);
    expect(cursor.offset).toBe(2);
    expect(cursor.slice()).toBe('cdef');
  })

  test(`${label} accepts bytes as well as text`, () => {
    const cursor = new Cursor(toBytes('07é'), 2);

    expect(cursor.offset).toBe(2);
    expect(cursor.slice()).toBe('é');
  })

  test(`${label} helpers`, () => {
    expect(byteLength('é')).toBe(2);
    expect(byteLength('[year]')).toBe(6);
    expect(isWhitespace(0x20)).toBe(true);
    expect(isWhitespace(0x09)).toBe(true);
    expect(isWhitespace(0x41)).toBe(false);
  })

})
