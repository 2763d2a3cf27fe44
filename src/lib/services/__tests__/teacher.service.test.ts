import { describe, it, expect, beforeEach, vi } from 'vitest'

vi.mock('../../../db', async () => {
  const { createTestDb } = await import('../../../test/db')
  return createTestDb()
})

import { db } from '../../../db'
import { resetTestDb } from '../../../test/db'
import { addEntry, addWorkingHours, at, createLesson, createTeacher } from '../../../test/fixtures'
import { datesForPlanning, findFreeTeachers, getTeacherOrThrow } from '../teacher.service'

const MONDAY = '2024-07-15'

describe('findFreeTeachers', () => {
  beforeEach(() => resetTestDb(db))

  it('keeps teachers with a free slot and orders them by name', async () => {
    const zed = await createTeacher({ lastName: 'Zed' })
    const abel = await createTeacher({ lastName: 'Abel' })
    await addWorkingHours(zed.id, 1, '13:00', '15:00')
    await addWorkingHours(abel.id, 1, '09:00', '10:00')

    expect((await findFreeTeachers(MONDAY)).map(teacher => teacher.id)).toEqual([abel.id, zed.id])
  })

  it('drops fully booked teachers and teachers off that day', async () => {
    const booked = await createTeacher({ lastName: 'Booked' })
    const free = await createTeacher({ lastName: 'Free' })
    const wednesday = await createTeacher({ lastName: 'Wednesday' })
    const noHours = await createTeacher({ lastName: 'Unplanned' })
    await addWorkingHours(booked.id, 1, '13:00', '14:00')
    await addWorkingHours(free.id, 1, '13:00', '14:00')
    await addWorkingHours(wednesday.id, 3, '13:00', '14:00')

    const lesson = await createLesson('ordinary')
    await addEntry(booked.id, lesson, '2024-07-15T13:00:00Z', '2024-07-15T14:00:00Z')

    const found = await findFreeTeachers(MONDAY)
    expect(found.map(teacher => teacher.id)).toEqual([free.id])
    expect(found.map(teacher => teacher.id)).not.toContain(noHours.id)
  })

  it('leaves out inactive teachers', async () => {
    const inactive = await createTeacher({ isActive: false })
    await addWorkingHours(inactive.id, 1, '13:00', '15:00')

    expect(await findFreeTeachers(MONDAY)).toEqual([])
  })

  it('applies the lesson type filter per teacher', async () => {
    const teacher = await createTeacher()
    await addWorkingHours(teacher.id, 1, '13:00', '14:00')
    const ordinary = await createLesson('ordinary')
    await addEntry(teacher.id, ordinary, '2024-07-15T13:00:00Z', '2024-07-15T14:00:00Z')

    expect(await findFreeTeachers(MONDAY)).toEqual([])
    expect((await findFreeTeachers(MONDAY, { lessonType: 'paired' })).map(t => t.id)).toEqual([teacher.id])
  })

  it('finds only the hosts of a hosted lesson type', async () => {
    const host = await createTeacher({ lastName: 'Host' })
    const idle = await createTeacher({ lastName: 'Idle' })
    await addWorkingHours(host.id, 1, '13:00', '15:00')
    await addWorkingHours(idle.id, 1, '13:00', '15:00')
    const masterClass = await createLesson('master_class', host.id)
    await addEntry(host.id, masterClass, '2024-07-15T14:10:00Z', '2024-07-15T14:40:00Z')

    expect((await findFreeTeachers(MONDAY, { lessonType: 'master_class' })).map(t => t.id)).toEqual([host.id])
    expect((await findFreeTeachers(MONDAY)).map(t => t.id)).toEqual([host.id, idle.id])
  })
})

describe('getTeacherOrThrow', () => {
  beforeEach(() => resetTestDb(db))

  it('throws for an unknown teacher', async () => {
    await expect(getTeacherOrThrow('00000000-0000-4000-8000-000000000000'))
      .rejects.toThrow('Teacher not found: 00000000-0000-4000-8000-000000000000')
  })
})

describe('datesForPlanning', () => {
  it('starts on the day of now and covers the horizon', () => {
    expect([...datesForPlanning(at('2024-07-30T18:00:00Z'), 3)]).toEqual(['2024-07-30', '2024-07-31', '2024-08-01'])
  })

  it('defaults to a week', () => {
    const dates = [...datesForPlanning(at('2024-07-15T08:00:00Z'))]
    expect(dates).toHaveLength(7)
    expect(dates[6]).toBe('2024-07-21')
  })
})
