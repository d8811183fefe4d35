import { Enumeration, EnumValue, type ValueInit } from '../../src/index.js';

export class Day extends EnumValue<Day> {
  get isWorkingDay(): boolean {
    return !this.equals(Days.Saturday) && !this.equals(Days.Sunday);
  }
}

const day = (init: ValueInit<Day>): Day => new Day(init);

export const DayEnum = new Enumeration<Day>({ name: 'Day' });

export const Days = DayEnum.declare({
  Monday: day,
  Tuesday: day,
  Wednesday: day,
  Thursday: day,
  Friday: day,
  Saturday: day,
  Sunday: day,
});

export const weekdays = DayEnum.setOf(
  Days.Monday,
  Days.Tuesday,
  Days.Wednesday,
  Days.Thursday,
  Days.Friday
);

export const weekend = DayEnum.setOf(Days.Saturday, Days.Sunday);
