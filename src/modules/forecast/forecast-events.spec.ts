import {
  bestEvent,
  degreesToCompass,
  pairEventsByDay,
  summarizeEvent,
  utcOffsetFromLongitude,
} from './forecast-events';
import { ForecastEvent } from './sunsethue.dto';

function event(overrides: Partial<ForecastEvent>): ForecastEvent {
  return {
    type: 'sunset',
    model_data: true,
    quality: 0.5,
    quality_text: 'Fair',
    cloud_cover: 0.2,
    time: '2026-10-20T01:30:00Z',
    direction: 255,
    ...overrides,
  };
}

describe('bestEvent', () => {
  const morning = event({ type: 'sunrise', quality: 0.4 });
  const noModel = event({ type: 'sunset', quality: 0.8, model_data: false });
  const evening = event({ type: 'sunset', quality: 0.6 });
  const nextMorning = event({ type: 'sunrise', quality: 0.6 });

  it('picks the highest quality event with model data, earliest on ties', () => {
    expect(bestEvent([morning, noModel, evening, nextMorning])).toBe(evening);
  });

  it('restricts the choice to one event type', () => {
    expect(bestEvent([morning, noModel, evening, nextMorning], 'sunrise')).toBe(
      nextMorning,
    );
  });

  it('counts a missing quality as zero', () => {
    const unscored = event({ quality: null });
    expect(bestEvent([unscored])).toBe(unscored);
  });

  it('returns null when no event has model data', () => {
    expect(bestEvent([noModel])).toBeNull();
    expect(bestEvent([])).toBeNull();
  });
});

describe('degreesToCompass', () => {
  it.each([
    [0, 'N'],
    [22.5, 'NNE'],
    [90, 'E'],
    [247.5, 'WSW'],
    [292, 'WNW'],
    [350, 'N'],
  ])('maps %d degrees to %s', (degrees, expected) => {
    expect(degreesToCompass(degrees)).toBe(expected);
  });

  it('returns null without a bearing', () => {
    expect(degreesToCompass(null)).toBeNull();
  });
});

describe('utcOffsetFromLongitude', () => {
  it('rounds to whole hours of 15 degrees', () => {
    expect(utcOffsetFromLongitude(-122.1817)).toBe(-8);
    expect(utcOffsetFromLongitude(151.2)).toBe(10);
    expect(utcOffsetFromLongitude(0)).toBe(0);
  });
});

describe('pairEventsByDay', () => {
  it('groups sunrise and sunset by local date', () => {
    const sunrise = event({ type: 'sunrise', time: '2026-10-19T14:20:00Z' });
    const sunset = event({ type: 'sunset', time: '2026-10-20T01:30:00Z' });
    const skipped = event({ type: 'sunrise', model_data: false, time: '2026-10-20T14:21:00Z' });
    const nextSunrise = event({ type: 'Sunrise', time: '2026-10-20T14:22:00Z' });

    expect(pairEventsByDay([sunrise, sunset, skipped, nextSunrise], -8)).toEqual([
      { date: '2026-10-19', sunrise, sunset },
      { date: '2026-10-20', sunrise: nextSunrise, sunset: null },
    ]);
  });

  it('files events without a usable time under unknown', () => {
    const untimed = event({ type: 'sunset', time: null });
    const garbled = event({ type: 'sunrise', time: 'not a time' });

    expect(pairEventsByDay([untimed, garbled], 0)).toEqual([
      { date: 'unknown', sunrise: garbled, sunset: untimed },
    ]);
  });
});

describe('summarizeEvent', () => {
  it('flattens an event and adds the compass direction', () => {
    expect(
      summarizeEvent(
        event({
          quality: 0.72,
          quality_text: 'Great',
          direction: 292,
          magics: { golden_hour: ['2026-10-20T01:00:00Z', '2026-10-20T01:40:00Z'] },
        }),
      ),
    ).toEqual({
      type: 'sunset',
      quality: 0.72,
      qualityText: 'Great',
      time: '2026-10-20T01:30:00Z',
      cloudCover: 0.2,
      direction: 292,
      compass: 'WNW',
      magics: { golden_hour: ['2026-10-20T01:00:00Z', '2026-10-20T01:40:00Z'] },
    });
  });

  it('fills defaults for missing values', () => {
    expect(
      summarizeEvent(
        event({ quality: null, quality_text: null, direction: null }),
      ),
    ).toMatchObject({
      quality: 0,
      qualityText: '',
      compass: null,
      magics: {},
    });
  });
});
