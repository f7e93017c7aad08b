import { describe, expect, it } from 'vitest'
import { FRAMES_PER_SECOND, Time, TimeError } from './index'

describe('Time', () => {
	describe('parse', () => {
		it('should parse mm:ss:ff', () => {
			const time = Time.parse('03:45:30')
			expect(time.minutes).toBe(3)
			expect(time.seconds).toBe(45)
			expect(time.frames).toBe(30)
		})

		it('should reject anything but 8 characters', () => {
			expect(() => Time.parse('3:45:30')).toThrow(TimeError)
			expect(() => Time.parse('03:45:30 ')).toThrow(TimeError)
			expect(() => Time.parse('003:45:30')).toThrow(TimeError)
		})

		it('should reject out of range seconds and frames', () => {
			const run = () => Time.parse('00:60:00')
			expect(run).toThrow(TimeError)
			expect(run).toThrow(expect.objectContaining({ reason: 'out-of-range' }))
			expect(() => Time.parse('00:00:75')).toThrow(TimeError)
		})

		it('should return undefined from tryParse', () => {
			expect(Time.tryParse('10:10:30')).toEqual(new Time(10, 10, 30))
			expect(Time.tryParse('10:10:99')).toBeUndefined()
			expect(Time.tryParse('860B640B')).toBeUndefined()
		})
	})

	describe('frames', () => {
		it('should count total frames', () => {
			expect(new Time(0, 0, 0).totalFrames).toBe(0)
			expect(new Time(0, 1, 0).totalFrames).toBe(FRAMES_PER_SECOND)
			expect(new Time(1, 0, 0).totalFrames).toBe(4500)
			expect(new Time(4, 17, 52).totalFrames).toBe(19327)
		})

		it('should normalize from total frames', () => {
			expect(Time.fromTotalFrames(19327)).toEqual(new Time(4, 17, 52))
			expect(Time.fromTotalFrames(75)).toEqual(new Time(0, 1, 0))
			expect(Time.fromTotalFrames(4500 * 120)).toEqual(new Time(120, 0, 0))
		})

		it('should roundtrip through total frames', () => {
			const times = [new Time(0, 0, 0), new Time(0, 59, 74), new Time(58, 41, 36), new Time(123, 4, 5)]
			for (const time of times) {
				expect(Time.fromTotalFrames(time.totalFrames)).toEqual(time)
			}
		})

		it('should roundtrip through its display form', () => {
			const times = [new Time(0, 0, 0), new Time(3, 45, 30), new Time(99, 59, 74)]
			for (const time of times) {
				expect(Time.parse(time.toString())).toEqual(time)
			}
		})

		it('should reject negative frame counts', () => {
			expect(() => Time.fromTotalFrames(-1)).toThrow(TimeError)
		})

		it('should convert seconds', () => {
			expect(Time.fromSeconds(225.5)).toEqual(new Time(3, 45, 38))
			expect(new Time(3, 45, 0).toSeconds()).toBe(225)
		})
	})

	describe('subtract', () => {
		it('should subtract by total frames', () => {
			expect(new Time(4, 17, 52).subtract(new Time(0, 0, 0))).toEqual(new Time(4, 17, 52))
			expect(new Time(58, 41, 36).subtract(new Time(0, 2, 0))).toEqual(new Time(58, 39, 36))
			expect(new Time(1, 0, 0).subtract(new Time(0, 0, 1))).toEqual(new Time(0, 59, 74))
		})

		it('should give zero for equal times', () => {
			const time = new Time(12, 34, 56)
			expect(time.subtract(time)).toEqual(Time.ZERO)
		})

		it('should throw instead of going below zero', () => {
			const run = () => new Time(0, 1, 0).subtract(new Time(0, 1, 1))
			expect(run).toThrow(TimeError)
			expect(run).toThrow(expect.objectContaining({ kind: 'time', reason: 'underflow' }))
		})
	})

	describe('ordering and display', () => {
		it('should compare by total frames', () => {
			expect(new Time(1, 0, 0).compare(new Time(0, 59, 74))).toBeGreaterThan(0)
			expect(new Time(0, 0, 0).compare(new Time(0, 0, 1))).toBeLessThan(0)
			expect(new Time(2, 2, 2).equals(new Time(2, 2, 2))).toBe(true)
		})

		it('should add', () => {
			expect(new Time(0, 59, 74).add(new Time(0, 0, 1))).toEqual(new Time(1, 0, 0))
		})

		it('should format', () => {
			expect(new Time(3, 45, 30).toString()).toBe('03:45:30')
			expect(new Time(3, 45, 30).toShortString()).toBe('03:45')
			expect(new Time(123, 0, 0).toString()).toBe('123:00:00')
			expect(JSON.stringify({ at: new Time(0, 2, 0) })).toBe('{"at":"00:02:00"}')
		})

		it('should validate components', () => {
			expect(() => new Time(-1, 0, 0)).toThrow(TimeError)
			expect(() => new Time(0, 1.5, 0)).toThrow(TimeError)
		})
	})
})
