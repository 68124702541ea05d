import type { MonitorSession } from '../session/monitorSession';

export interface ListCommandOptions {
	session: MonitorSession;
	json: boolean;
	write: (line: string) => void;
}

export async function runListCommand(options: ListCommandOptions): Promise<void> {
	const [devices, positions] = await Promise.all([options.session.listDevices(), options.session.listPositions()]);
	if (options.json) {
		const payload = devices.map((device) => ({
			...device,
			positions: positions.filter((position) => position.deviceId === device.id)
		}));
		options.write(JSON.stringify(payload, null, 2));
		return;
	}

	if (devices.length === 0) {
		options.write('No devices found');
		return;
	}
	for (const device of devices) {
		options.write(`${device.id}: ${device.name} (${device.state})`);
		for (const position of positions.filter((entry) => entry.deviceId === device.id)) {
			const simulated = position.isSimulated ? ' (simulated)' : '';
			const port = position.controlPort > 0 ? `port ${position.controlPort}` : 'not running';
			options.write(`  ${position.name}${simulated}: ${position.state}, ${port}`);
		}
	}
}
