import { describe, it, expect, beforeEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { createApp } from '../../app';
import { ScheduleAgent } from '../../agents/scheduleAgent';
import type { IScheduleSource } from '../../agents/types';
import { MemStorage } from '../../storage';
import { AccessDeniedError } from '../../types/errors';
import { FakeScheduleSource } from '../helpers/fakeScheduleSource';
import { makeGame } from '../helpers/gameFactory';

const cardinalsAtTitans = makeGame(
  'Arizona Cardinals',
  'Tennessee Titans',
  [7, 17, 7, 7, 0, 38],
  [0, 6, 0, 7, 0, 13],
  '2021-09-12T13:00:00'
);
const titansAtSeahawks = makeGame(
  'Tennessee Titans',
  'Seattle Seahawks',
  [0, 3, 14, 10, 3, 33],
  [7, 17, 0, 6, 0, 30],
  '2021-09-19T16:25:00',
  { boxscoreUrl: 'https://pfr.test/boxscores/202109190sea.htm', boxscoreHtml: '<html>box score</html>' }
);

function appWith(source: IScheduleSource): Express {
  return createApp(new ScheduleAgent({ source, store: new MemStorage(), cacheEnabled: true }));
}

describe('Schedule API', () => {
  let source: FakeScheduleSource;
  let app: Express;

  beforeEach(() => {
    source = new FakeScheduleSource({
      '2021:1': [cardinalsAtTitans],
      '2021:2': [titansAtSeahawks],
    });
    app = appWith(source);
  });

  it('reports health', async () => {
    const res = await request(app).get('/api/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('renders a week as plain text by default', async () => {
    const res = await request(app).get('/api/schedule/2021/2?records=true&quality=yes');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain/);
    expect(res.text).toBe('Tennessee Titans (0-1) at Seattle Seahawks (0-0), Sunday, Sep 19, 4:25 PM (good game)\n');
  });

  it('renders HTML with deep links', async () => {
    const res = await request(app).get('/api/schedule/2021/2?format=HTML&links=1');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/html/);
    expect(res.text).toBe(
      [
        '<html><body>',
        '<p><a href="https://www.nfl.com/games/titans-at-seahawks-2021-reg-2">' +
          'Tennessee Titans at Seattle Seahawks, Sunday, Sep 19, 4:25 PM</a></p>',
        '</body></html>',
      ].join('\n')
    );
  });

  it('returns games as JSON without the cached markup', async () => {
    const res = await request(app).get('/api/schedule/2021/2?format=json');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      year: 2021,
      week: 2,
      games: [
        {
          teamAway: 'Tennessee Titans',
          teamHome: 'Seattle Seahawks',
          startTime: '2021-09-19T16:25:00',
          awayScores: [0, 3, 14, 10, 3, 33],
          homeScores: [7, 17, 0, 6, 0, 30],
          awayRecord: '0-0',
          homeRecord: '0-0',
          boxscoreUrl: 'https://pfr.test/boxscores/202109190sea.htm',
        },
      ],
    });
  });

  it('accepts playoff round names', async () => {
    const res = await request(app).get('/api/schedule/2021/wild%20card?format=json');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ year: 2021, week: 19, games: [] });
    expect(source.calls).toEqual([{ year: 2021, week: 19 }]);
  });

  it('rejects a wild card round before it existed', async () => {
    const res = await request(app).get('/api/schedule/1970/wild%20card');

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('VALIDATION_ERROR');
    expect(res.body.error.details.issues).toEqual([
      { path: ['week'], message: 'The wild card round did not exist until 1978' },
    ]);
    expect(source.calls).toHaveLength(0);
  });

  it('rejects malformed years and formats', async () => {
    const badYear = await request(app).get('/api/schedule/21/1');
    const badFormat = await request(app).get('/api/schedule/2021/1?format=pdf');

    expect(badYear.status).toBe(400);
    expect(badFormat.status).toBe(400);
    expect(badFormat.body.error.message).toBe('Invalid request');
  });

  it('maps access denial to 503 with the request id', async () => {
    const denied: IScheduleSource = {
      fetchWeek: async () => {
        throw new AccessDeniedError('https://pfr.test/years/2021/week_1.htm');
      },
    };

    const res = await request(appWith(denied)).get('/api/schedule/2021/1');

    expect(res.status).toBe(503);
    expect(res.body.error.code).toBe('ACCESS_DENIED');
    expect(res.body.error.message).toBe('Access denied by source: https://pfr.test/years/2021/week_1.htm');
    expect(res.body.error.requestId).toBe(res.headers['x-request-id']);
  });

  it('hides unexpected failures behind a 500', async () => {
    const broken: IScheduleSource = {
      fetchWeek: async () => {
        throw new Error('socket closed');
      },
    };

    const res = await request(appWith(broken)).get('/api/schedule/2021/1?format=json');

    expect(res.status).toBe(500);
    expect(res.body.error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
  });
});
