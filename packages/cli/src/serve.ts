// © 2026 LearnHubPlay BV. All rights reserved.
// Licensed under BUSL 1.1 — see LICENSE for details.

import { Command } from "commander";
import chalk from "chalk";
import { createLogger, loadConfig, VERSION, type MeshGateConfig } from "@meshgate/core";
import { MeshGate } from "@meshgate/mesh";
import { createServer } from "@meshgate/api";

interface ServeOptions {
    config?: string;
    host?: string;
    port?: string;
    device?: string;
}

/** Apply command-line flags on top of the loaded config. "--device host:port" or "--device host". */
export function applyServeOptions(config: MeshGateConfig, options: ServeOptions): MeshGateConfig {
    const device = { ...config.device };
    if (options.device) {
        const [host, port] = options.device.split(":");
        if (host) device.host = host;
        if (port) device.port = parsePort(port, "--device");
    }
    return {
        ...config,
        device,
        api: {
            ...config.api,
            host: options.host ?? config.api.host,
            port: options.port ? parsePort(options.port, "--port") : config.api.port,
        },
    };
}

function parsePort(value: string, flag: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
        throw new Error(`${flag}: '${value}' is not a valid port`);
    }
    return port;
}

export const serveCommand = new Command("serve")
    .description("Connect to the gateway radio and start the REST API")
    .option("-c, --config <path>", "Path to meshgate.yaml")
    .option("-H, --host <host>", "Address to bind the API to")
    .option("-p, --port <number>", "Port to bind the API to")
    .option("-d, --device <host[:port]>", "Gateway radio address")
    .action(async (options: ServeOptions) => {
        const config = applyServeOptions(loadConfig(options.config), options);
        const logger = createLogger(config.log);

        const gate = new MeshGate({ config, logger });
        const fastify = await createServer({ facade: gate.facade, config: config.api, logger });

        let stopping = false;
        const shutdown = async (signal: string) => {
            if (stopping) return;
            stopping = true;
            logger.info(`${signal} received, shutting down`);
            await fastify.close();
            await gate.stop();
        };
        for (const signal of ["SIGINT", "SIGTERM"] as const) {
            process.once(signal, () => {
                shutdown(signal).catch((err: unknown) => {
                    logger.error({ err }, "Error during shutdown");
                    process.exitCode = 1;
                });
            });
        }

        gate.start();
        await fastify.listen({ port: config.api.port, host: config.api.host });

        const base = `http://${config.api.host}:${config.api.port}`;
        console.log(
            `\n  ${chalk.bold("MeshGate")}  v${VERSION}\n` +
            `  Radio      → ${chalk.cyan(`${config.device.host}:${config.device.port}`)}\n` +
            `  Listening  → ${chalk.green(`${base}${config.api.prefix}`)}\n` +
            (config.api.swagger ? `  Swagger UI → ${chalk.green(`${base}/docs`)}\n` : ""),
        );
    });
