import { paddingVariants, parseCalendarDate } from './parse-date'

describe('parseCalendarDate', () => {
  it.each([
    ['2024-03-05', '2024-03-05'],
    ['2024-03-05T23:30:00+05:30', '2024-03-05'],
    ['05/03/2024', '2024-03-05'],
    ['5-3-2024', '2024-03-05'],
    ['05.03.2024', '2024-03-05'],
    ['03/25/2024', '2024-03-25'],
    ['5 Mar 2024', '2024-03-05'],
    ['Mar 5, 2024', '2024-03-05'],
    ['5/3/2024', '2024-03-05'],
    ['5/03/2024', '2024-03-05'],
    ['05 Mar 2024', '2024-03-05'],
    ['Mar 05, 2024', '2024-03-05'],
    ['2024/03/07', '2024-03-07'],
    ['2024/3/7', '2024-03-07'],
    ['20240305', '2024-03-05'],
  ])('parses %p', (input, expected) => {
    expect(parseCalendarDate(input)).toEqual({ kind: 'date', value: expected })
  })

  it('reads ambiguous dates with the first matching format', () => {
    expect(parseCalendarDate('04/05/2024', ['M/D/YYYY', 'D/M/YYYY'])).toEqual({ kind: 'date', value: '2024-04-05' })
    expect(parseCalendarDate('04/05/2024', ['D/M/YYYY', 'M/D/YYYY'])).toEqual({ kind: 'date', value: '2024-05-04' })
  })

  it('tries a configured format with and without leading zeros', () => {
    expect(paddingVariants('D/M/YYYY')).toEqual(['DD/MM/YYYY', 'DD/M/YYYY', 'D/MM/YYYY', 'D/M/YYYY'])
    expect(paddingVariants('MMM DD, YYYY')).toEqual(['MMM DD, YYYY', 'MMM D, YYYY'])
    expect(parseCalendarDate('07/03/2024', ['D/M/YYYY'])).toEqual({ kind: 'date', value: '2024-03-07' })
    expect(parseCalendarDate('7/3/2024', ['DD/MM/YYYY'])).toEqual({ kind: 'date', value: '2024-03-07' })
  })

  it.each(['2024', '202403', '2024-03', '2024-W10'])('rejects the partial date %p', (input) => {
    expect(parseCalendarDate(input)).toEqual({ kind: 'invalid' })
  })

  it('converts Excel serial numbers', () => {
    expect(parseCalendarDate(45000)).toEqual({ kind: 'date', value: '2023-03-15' })
    expect(parseCalendarDate(45352)).toEqual({ kind: 'date', value: '2024-03-01' })
  })

  it('formats Date cells as calendar dates', () => {
    expect(parseCalendarDate(new Date(2024, 2, 5))).toEqual({ kind: 'date', value: '2024-03-05' })
  })

  it('separates blanks from garbage', () => {
    expect(parseCalendarDate(null)).toEqual({ kind: 'empty' })
    expect(parseCalendarDate('  ')).toEqual({ kind: 'empty' })
    expect(parseCalendarDate('2024-02-30')).toEqual({ kind: 'invalid' })
    expect(parseCalendarDate('yesterday')).toEqual({ kind: 'invalid' })
    expect(parseCalendarDate(-4)).toEqual({ kind: 'invalid' })
  })
})
