import * as fc from 'fast-check';
import { mapWithConcurrency, runProbing } from './scheduler';
import { delayed, fakeFetch, makeSite, respond } from './test-utils';

describe('scheduler properties', () => {
  test('report has one verdict per selected site and in-flight never exceeds the limit', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.integer({ min: 0, max: 8 }), { minLength: 1, maxLength: 15 }),
        fc.integer({ min: 1, max: 6 }),
        async (latencies, workerLimit) => {
          const sites = latencies.map((_, index) => makeSite(`Site${index}`));
          const fake = fakeFetch(
            Object.fromEntries(
              sites.map((site, index) => [
                `https://${site.name.toLowerCase()}.test/alice`,
                delayed(latencies[index], respond(index % 2 === 0 ? 200 : 404)),
              ])
            )
          );

          const report = await runProbing(
            'alice',
            sites,
            {
              workerLimit,
              timeoutMs: 1000,
              siteFilter: [],
              categoryFilter: [],
              quiet: true,
              showNotFound: false,
              showFailed: false,
            },
            { fetchImpl: fake.fetch }
          );

          expect(report.verdicts.map((verdict) => verdict.site.name)).toEqual(sites.map((site) => site.name));
          expect(fake.maxInFlight()).toBeLessThanOrEqual(workerLimit);
          expect(report.counts.found + report.counts['not-found'] + report.counts.failed).toBe(sites.length);
        }
      ),
      { numRuns: 25 }
    );
  });

  test('mapWithConcurrency visits every item exactly once', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.nat(), { maxLength: 30 }), fc.integer({ min: 1, max: 8 }), async (items, limit) => {
        const visited: number[] = [];
        let active = 0;
        let peak = 0;
        await mapWithConcurrency(items, limit, undefined, async (item) => {
          active += 1;
          peak = Math.max(peak, active);
          await Promise.resolve();
          visited.push(item);
          active -= 1;
        });
        expect(visited.slice().sort((a, b) => a - b)).toEqual(items.slice().sort((a, b) => a - b));
        expect(peak).toBeLessThanOrEqual(limit);
      })
    );
  });
});
