import { describe, expect, it, vi } from 'vitest';

import { defineEnum, SimpleEnumeration, SimpleValue } from '../src/index.js';

describe('defineEnum', () => {
  it('registers members in order with explicit names', () => {
    const { enumeration: Suit, members } = defineEnum('Suit', [
      'Clubs',
      'Diamonds',
      'Hearts',
      'Spades',
    ]);

    expect(Suit).toBeInstanceOf(SimpleEnumeration);
    expect(Suit.name).toBe('Suit');
    expect(members.Hearts).toBeInstanceOf(SimpleValue);
    expect(members.Hearts.id).toBe(2);
    expect(members.Hearts.name).toBe('Hearts');
    expect(Suit.valueByName('Spades')).toBe(members.Spades);
    expect(Suit.maxId).toBe(4);
  });

  it('freezes the definition and its members', () => {
    const definition = defineEnum('Coin', ['Heads', 'Tails']);

    expect(Object.isFrozen(definition)).toBe(true);
    expect(Object.isFrozen(definition.members)).toBe(true);
    expect(Object.keys(definition.members)).toEqual(['Heads', 'Tails']);
  });

  it('passes the remaining configuration through', () => {
    const onRegister = vi.fn();
    const { enumeration: Level, members } = defineEnum('Level', ['Low', 'High'], {
      initial: 1,
      onRegister,
    });

    expect(members.Low.id).toBe(1);
    expect(members.High.id).toBe(2);
    expect(Level.minId).toBe(0);
    expect(Level.maxId).toBe(3);
    expect(Level.values.toBitMask()).toEqual([6]);
    expect(onRegister).toHaveBeenCalledTimes(2);
  });

  it('can grow after definition', () => {
    const { enumeration: Size, members } = defineEnum('Size', ['Small', 'Large']);
    const huge = Size.create({ name: 'Huge' });

    expect(huge.id).toBe(2);
    expect(members.Large.combine(huge).toString()).toBe('Size.ValueSet(Large, Huge)');
  });
});

describe('SimpleEnumeration', () => {
  it('declares names without factories', () => {
    const Color = new SimpleEnumeration({ name: 'Color' });
    const { Red, Green, Blue } = Color.declareNames('Red', 'Green', 'Blue');

    expect([Red.id, Green.id, Blue.id]).toEqual([0, 1, 2]);
    expect(Red.combine(Blue).toString()).toBe('Color.ValueSet(Red, Blue)');
  });

  it('creates values with explicit ids and names', () => {
    const Priority = new SimpleEnumeration({ name: 'Priority' });
    const none = Priority.create({ id: -1, name: 'None' });
    const low = Priority.create({ name: 'Low' });

    expect(none.id).toBe(-1);
    expect(low.id).toBe(0);
    expect(Priority.values.toString()).toBe('Priority.ValueSet(None, Low)');
  });
});
