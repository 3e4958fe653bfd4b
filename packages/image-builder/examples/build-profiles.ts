import * as path from 'path';
import { BuildOrchestrator, FeatureProfile, loadConfig, renderDockerfile } from '../src';

// Usage: tsx examples/build-profiles.ts <context-dir> [config.json]
async function buildProfiles() {
  const contextDirectory = path.resolve(process.argv[2] ?? '.');
  const config = await loadConfig(process.argv[3]);
  const orchestrator = new BuildOrchestrator({ config });
  const context = orchestrator.resolveContext(contextDirectory);

  orchestrator.on('stage:skipped', ({ stage, reason }) => {
    console.log(`  skipped ${stage}: ${reason}`);
  });

  const profiles: FeatureProfile[] = ['minimal', 'database-only', 'full'];
  for (const profile of profiles) {
    console.log(`\nBuilding ${profile} image from ${contextDirectory}...`);
    try {
      const image = await orchestrator.build(context, profile);
      console.log(`${profile} image built:`, {
        id: image.id,
        layers: image.layers.map((layer) => layer.stage),
        packages: image.installedPackages,
        user: image.activeUser.username,
      });
      console.log(renderDockerfile(image));
    } catch (error) {
      // Profiles lacking a dependency's build packages fail here
      console.error(`${profile} build failed:`, error instanceof Error ? error.message : error);
    }
  }
}

buildProfiles().catch(console.error);
