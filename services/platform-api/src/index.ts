import { logger } from "../../../libs/logging/logger.js";
import { ConfigGuard } from "../../../libs/bootstrap/config-guard.js";
import { ANSIBLE_CONFIG_GUARDS, loadAnsibleConfig, loadServerConfig } from "../../../libs/bootstrap/config/ansible-config.js";
import { AnsiblePingService } from "../../../libs/ansible/pingService.js";
import { createApp } from "./app.js";

async function main() {
    logger.info({ serviceName: "platform-api" }, "Bootstrapping service");

    ConfigGuard.enforce(ANSIBLE_CONFIG_GUARDS);

    const ansibleConfig = loadAnsibleConfig();
    const { port } = loadServerConfig();

    const app = createApp({ pingService: new AnsiblePingService(ansibleConfig) });

    await new Promise<void>((resolve, reject) => {
        const server = app.listen(port, () => resolve());
        server.once('error', reject);
    });

    logger.info({
        port,
        playbook: ansibleConfig.playbookPath,
        inventory: ansibleConfig.staticInventoryPath,
        timeoutSeconds: ansibleConfig.timeoutSeconds
    }, "Platform API listening");
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
