import {HTSP_DEFAULT_HOST, HTSP_DEFAULT_PORT, HtspSession, type DvrEntry, type NotificationObserver} from '../src';

type CliOptions = {
    host: string;
    port?: number;
    user?: string;
    password?: string;
    epg: boolean;
};

function parseArgs(argv: string[]): CliOptions {
    const options: CliOptions = {host: HTSP_DEFAULT_HOST, epg: false};
    for (const arg of argv) {
        if (arg.startsWith('--host=')) {
            options.host = arg.substring('--host='.length);
        } else if (arg.startsWith('--port=')) {
            const port = Number(arg.substring('--port='.length));
            if (Number.isInteger(port) && port > 0 && port <= 65535) options.port = port;
        } else if (arg.startsWith('--user=')) {
            options.user = arg.substring('--user='.length);
        } else if (arg.startsWith('--password=')) {
            options.password = arg.substring('--password='.length);
        } else if (arg === '--epg') {
            options.epg = true;
        }
    }
    return options;
}

const formatEntry = (entry: DvrEntry): string =>
    `${entry.start.toISOString()} ${entry.channel?.name ?? `#${entry.channelId}`} ${entry.title ?? '(untitled)'}`;

const options = parseArgs(process.argv.slice(2));
const session = new HtspSession({host: options.host, port: options.port, epg: options.epg});
const controller = new AbortController();

session.on('state', (state) => {
    console.log(`Session state: ${state}`);
});

async function main(): Promise<void> {
    const info = await session.hello();
    console.log(`Connected to ${info.serverName} ${info.serverVersion} at ${options.host}:${options.port ?? HTSP_DEFAULT_PORT}`);
    console.log(`Protocol version: ${session.protocolVersion}`);

    if (options.user) {
        await session.authenticate(options.user, options.password);
    }

    const disk = await session.getDiskSpace();
    console.log(`Disk: ${Math.round(disk.used / 2 ** 20)} MiB used of ${Math.round(disk.total / 2 ** 20)} MiB`);

    for (const tag of await session.listTags()) {
        console.log(`Tag ${tag.name}: ${tag.channels.map((channel) => channel.name).join(', ')}`);
    }
    for (const channel of await session.listChannels()) {
        console.log(`Channel ${channel.number} ${channel.name}`);
    }
    for (const entry of await session.listScheduled()) console.log(`Scheduled ${formatEntry(entry)}`);
    for (const entry of await session.listRecorded()) console.log(`Recorded  ${formatEntry(entry)}`);
    for (const entry of await session.listFailed()) {
        console.log(`Failed    ${formatEntry(entry)} ${entry.error ?? entry.state ?? ''}`);
    }
    for (const rule of await session.listAutorecEntries()) {
        console.log(`Autorec ${rule.id} "${rule.title ?? ''}" enabled=${rule.enabled}`);
    }

    const observer: NotificationObserver = (verb, entity) => {
        console.log(`${verb}${entity ? ` ${entity.constructor.name} ${entity.id}` : ''}`);
    };
    console.log('Monitoring, press Ctrl+C to stop');
    const result = await session.monitor(observer, {signal: controller.signal});
    if (result.reason === 'error') {
        console.error('[HtspError]', result.error.message);
        process.exitCode = 1;
    }
    session.close();
}

main().catch((err: unknown) => {
    console.error('[HtspError]', err instanceof Error ? err.message : err);
    session.close();
    process.exitCode = 1;
});

function shutdown(): void {
    controller.abort();
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
