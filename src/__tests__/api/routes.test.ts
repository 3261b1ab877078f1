import request from 'supertest';
import { createApp } from '../../api/server';
import { ReferenceTableCache } from '../../tables/tableCache';
import { baseCase, inactiveCase } from '../fixtures/caseConfigs';
import { InMemoryTableProvider, fakeTableSource } from '../fixtures/tables';

function createTestApp(failFirstLoads = 0) {
  const provider = new InMemoryTableProvider(fakeTableSource(), failFirstLoads);
  return { app: createApp(new ReferenceTableCache(provider)), provider };
}

describe('GET /api', () => {
  it('should return API information', async () => {
    const response = await request(createTestApp().app).get('/api');

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('Forensic Economic Loss API');
    expect(response.body.endpoints.run).toBeDefined();
    expect(response.body.endpoints.report).toBeDefined();
  });
});

describe('GET /api/health', () => {
  it('should return status ok with timestamp', async () => {
    const response = await request(createTestApp().app).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('ok');
    expect(response.body.timestamp).toBeDefined();
  });
});

describe('GET /api/cases/run', () => {
  it('should describe the endpoint', async () => {
    const response = await request(createTestApp().app).get('/api/cases/run');

    expect(response.status).toBe(200);
    expect(response.body.method).toBe('POST');
    expect(response.body.endpoint).toBe('/api/cases/run');
    expect(response.body.requiredFields).toHaveLength(4);
  });
});

describe('POST /api/cases/run', () => {
  it('should return the case result for a valid case', async () => {
    const response = await request(createTestApp().app).post('/api/cases/run').send(baseCase);

    expect(response.status).toBe(200);
    expect(response.body.caseId).toBe('case_001');
    expect(response.body.earnings.entries).toHaveLength(14);
    expect(response.body.audit).toHaveLength(8);
    expect(response.body.totalLoss).toBeCloseTo(1085949.97391947, 4);
  });

  it('should load the tables once across requests', async () => {
    const { app, provider } = createTestApp();

    await request(app).post('/api/cases/run').send(baseCase);
    await request(app).post('/api/cases/run').send(inactiveCase);

    expect(provider.loads).toEqual(['life_table', 'worklife_table', 'wage_growth', 'discount_rates']);
    expect(provider.closeCount).toBe(1);
  });

  it('should return 400 with the issues for an invalid case', async () => {
    const response = await request(createTestApp().app)
      .post('/api/cases/run')
      .send({ ...baseCase, occupation: { ...baseCase.occupation, baseSalary: 0 } });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid case configuration');
    expect(response.body.stage).toBe('config');
    expect(response.body.issues).toHaveLength(1);
  });

  it('should return 400 for an empty body', async () => {
    const response = await request(createTestApp().app).post('/api/cases/run').send({});

    expect(response.status).toBe(400);
  });

  it('should return 400 for an age outside the life table', async () => {
    const response = await request(createTestApp().app)
      .post('/api/cases/run')
      .send({ ...baseCase, person: { ...baseCase.person, dateOfBirth: '1900-01-01' } });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid age');
    expect(response.body.stage).toBe('life_expectancy');
  });

  it('should return 422 naming the table and stage for missing reference data', async () => {
    const response = await request(createTestApp().app)
      .post('/api/cases/run')
      .send({ ...baseCase, occupation: { ...baseCase.occupation, socCode: '99-0000' } });

    expect(response.status).toBe(422);
    expect(response.body).toEqual({
      error: 'Reference data not found',
      stage: 'wage_growth',
      table: 'wage_growth',
      key: { category: '99' },
      message: 'No wage_growth row for category=99',
    });
  });

  it('should return 500 when the tables cannot be loaded, then recover', async () => {
    const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const { app } = createTestApp(1);

      const failed = await request(app).post('/api/cases/run').send(baseCase);
      expect(failed.status).toBe(500);
      expect(failed.body.error).toBe('Internal server error');
      expect(consoleError).toHaveBeenCalled();

      const retried = await request(app).post('/api/cases/run').send(baseCase);
      expect(retried.status).toBe(200);
    } finally {
      consoleError.mockRestore();
    }
  });
});

describe('POST /api/cases/report', () => {
  it('should return the summary and every sheet', async () => {
    const response = await request(createTestApp().app).post('/api/cases/report').send(baseCase);

    expect(response.status).toBe(200);
    expect(response.body.caseId).toBe('case_001');
    expect(response.body.summary.discountRatePct).toBeCloseTo(4, 10);
    expect(response.body.sheets).toHaveLength(8);
    expect(response.body.sheets[0].name).toBe('dashboard');
  });

  it('should return 400 for an invalid case', async () => {
    const response = await request(createTestApp().app).post('/api/cases/report').send({ caseId: 'x' });

    expect(response.status).toBe(400);
  });
});
