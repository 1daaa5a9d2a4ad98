/**
 * Agent Registry — directory of agent profiles owned by the coordinator.
 *
 * Stores each agent's live profile so activity timestamps stay current;
 * every read hands out a snapshot copy.
 */
import type { Logger } from '@/observability/logger.js';
import type { AgentCapability, AgentProfile, AgentRegistry, AgentRole } from './types.js';

// ─── Registry Dependencies ───────────────────────────────────────

interface RegistryDeps {
  logger: Logger;
}

function snapshot(profile: AgentProfile): AgentProfile {
  return { ...profile, capabilities: [...profile.capabilities] };
}

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an in-memory agent registry.
 */
export function createAgentRegistry(deps: RegistryDeps): AgentRegistry {
  const profiles = new Map<string, AgentProfile>();

  function select(predicate: (profile: AgentProfile) => boolean): AgentProfile[] {
    return [...profiles.values()].filter(predicate).map(snapshot);
  }

  const registry: AgentRegistry = {
    register(profile: AgentProfile): boolean {
      if (profiles.has(profile.agentId)) {
        deps.logger.warn('Agent already registered', {
          component: 'agent-registry',
          agentId: profile.agentId,
        });
        return false;
      }

      profiles.set(profile.agentId, profile);
      deps.logger.info('Registered agent', {
        component: 'agent-registry',
        agentId: profile.agentId,
        name: profile.name,
        role: profile.role,
        capabilities: profile.capabilities,
      });
      return true;
    },

    unregister(agentId: string): boolean {
      const existed = profiles.delete(agentId);
      if (existed) {
        deps.logger.info('Unregistered agent', { component: 'agent-registry', agentId });
      }
      return existed;
    },

    get(agentId: string): AgentProfile | undefined {
      const profile = profiles.get(agentId);
      return profile ? snapshot(profile) : undefined;
    },

    has(agentId: string): boolean {
      return profiles.has(agentId);
    },

    list(): AgentProfile[] {
      return select(() => true);
    },

    listByRole(role: AgentRole): AgentProfile[] {
      return select((profile) => profile.role === role);
    },

    listByCapability(capability: AgentCapability): AgentProfile[] {
      return select((profile) => profile.capabilities.includes(capability));
    },

    listActive(): AgentProfile[] {
      return select((profile) => profile.isActive);
    },

    findByCapabilities(capabilities: readonly AgentCapability[]): AgentProfile[] {
      return select(
        (profile) =>
          profile.isActive &&
          profile.capabilities.some((capability) => capabilities.includes(capability)),
      );
    },

    touch(agentId: string, at: Date = new Date()): boolean {
      const profile = profiles.get(agentId);
      if (!profile) return false;
      profile.lastActivity = at;
      return true;
    },

    get size(): number {
      return profiles.size;
    },
  };

  return registry;
}
