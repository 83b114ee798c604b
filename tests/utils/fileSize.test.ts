import { describe, it, expect } from 'vitest'
import { formatETA, formatFileSize, formatProgress, formatSpeed } from '@/utils/fileSize'

describe('formatFileSize', () => {
  it('picks the largest whole unit', () => {
    expect(formatFileSize(0)).toBe('0 B')
    expect(formatFileSize(512)).toBe('512 B')
    expect(formatFileSize(1536)).toBe('1.5 KB')
    expect(formatFileSize(1024 * 1024)).toBe('1 MB')
  })
})

describe('formatSpeed', () => {
  it('appends /s and hides a zero rate', () => {
    expect(formatSpeed(2048)).toBe('2 KB/s')
    expect(formatSpeed(0)).toBe('—')
  })
})

describe('formatETA', () => {
  it('scales from seconds to hours', () => {
    expect(formatETA(45)).toBe('45s')
    expect(formatETA(125)).toBe('2m 5s')
    expect(formatETA(3720)).toBe('1h 2m')
    expect(formatETA(Infinity)).toBe('—')
  })
})

describe('formatProgress', () => {
  it('shows a one-decimal percentage and the byte counts', () => {
    expect(formatProgress(420, 1000)).toBe('42.0% (420/1000 bytes)')
    expect(formatProgress(1, 3)).toBe('33.3% (1/3 bytes)')
  })

  it('treats an empty file as complete', () => {
    expect(formatProgress(0, 0)).toBe('100.0% (0/0 bytes)')
  })
})
