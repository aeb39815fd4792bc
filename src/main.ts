import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { createRunContext } from './context.js';
import { errorMessage } from './errors.js';
import { geocodePostalCode } from './geocoder.js';
import { resolveInput, type RawInput } from './input.js';
import { logReport, scrapeWeekends } from './pipeline.js';
import { ApifyTableSink } from './sink.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

try {
    const input = resolveInput(await Actor.getInput<RawInput>(), process.argv.slice(2));
    if (input.verbose) {
        log.setLevel(log.LEVELS.DEBUG);
        log.debug('Verbose output.');
    }

    log.info('Starting weekend rental scraper', {
        weekendsAhead: input.weekendsAhead,
        postalCode: input.postalCode,
        maxMiles: input.maxMiles,
        make: input.make,
        model: input.model,
        maxConcurrency: input.maxConcurrency,
    });

    const context = createRunContext({ log });
    const location = await geocodePostalCode(input.postalCode, context);
    const report = await scrapeWeekends(input, location, context, new ApifyTableSink(log, { now: context.now }));
    logReport(report, context);

    if (report.ok) {
        await Actor.exit(`Uploaded ${report.uploadedTables.length} tables.`);
    } else {
        await Actor.fail('Some weekends could not be uploaded.');
    }
} catch (error) {
    log.error(`Run aborted: ${errorMessage(error)}`);
    await Actor.fail(errorMessage(error));
}
