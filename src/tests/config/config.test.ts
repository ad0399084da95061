import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  ConfigurationError,
  loadConfig,
  loadConfigAuto,
  loadConfigFromEnv,
  loadConfigSafe,
  readEnvironmentConfig,
  validateConfig,
  validateConfigSafe,
} from '../../config'
import { resolveAzureCredentials } from '../../storage/adapter-factory'
import { createDriver } from '../../driver/factory'
import { InMemoryBlobStore } from '../../storage/in-memory-blob-store'

describe('Driver configuration', () => {
  describe('schema', () => {
    it('should apply defaults', () => {
      const config = validateConfig({ backend: 'inmemory', container: 'registry' })

      expect(config).toEqual({
        backend: 'inmemory',
        container: 'registry',
        rootDirectory: '',
        createContainer: true,
        maxChunkSize: 4 * 1024 * 1024,
        logging: { level: 'info', pretty: false },
      })
    })

    it('should require credentials for the azure backend', () => {
      const result = validateConfigSafe({ container: 'registry' })

      expect(result).toEqual({
        success: false,
        errors: ['azure: azure backend requires connectionString, accountName and accountKey, or accountUrl'],
      })
    })

    it('should accept an account name and key', () => {
      const config = validateConfig({
        container: 'registry',
        azure: { accountName: 'acct', accountKey: 'test-secret' },
      })

      expect(config.azure).toEqual({ accountName: 'acct', accountKey: 'test-secret', realm: 'core.windows.net' })
    })

    it('should reject chunk sizes above the append limit', () => {
      const result = validateConfigSafe({
        backend: 'inmemory',
        container: 'registry',
        maxChunkSize: 4 * 1024 * 1024 + 1,
      })

      expect(result.success).toBe(false)
    })
  })

  describe('environment', () => {
    it('should read every supported variable', () => {
      const config = loadConfigFromEnv({
        AZURE_STORAGE_CONTAINER: 'registry',
        AZURE_STORAGE_CONNECTION_STRING: 'UseDevelopmentStorage=true',
        BLOBVFS_ROOT_DIRECTORY: '/docker',
        BLOBVFS_CREATE_CONTAINER: 'false',
        BLOBVFS_MAX_CHUNK_SIZE: '1048576',
        LOG_LEVEL: 'debug',
      })

      expect(config).toEqual({
        backend: 'azure',
        container: 'registry',
        rootDirectory: '/docker',
        createContainer: false,
        maxChunkSize: 1048576,
        azure: { connectionString: 'UseDevelopmentStorage=true', realm: 'core.windows.net' },
        logging: { level: 'debug', pretty: false },
      })
    })

    it('should leave out unset variables', () => {
      expect(readEnvironmentConfig({ AZURE_STORAGE_CONTAINER: 'c', BLOBVFS_ROOT_DIRECTORY: '' })).toEqual({
        container: 'c',
        logging: {},
      })
    })

    it('should reject malformed booleans and integers', () => {
      expect(() => readEnvironmentConfig({ LOG_PRETTY: 'yes' })).toThrow(ConfigurationError)
      expect(() => readEnvironmentConfig({ BLOBVFS_MAX_CHUNK_SIZE: '4k' })).toThrow(
        'BLOBVFS_MAX_CHUNK_SIZE must be an integer, got "4k"'
      )
    })

    it('should collect validation errors into a ConfigurationError', () => {
      let caught: unknown
      try {
        loadConfigFromEnv({ BLOBVFS_BACKEND: 'inmemory' })
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ConfigurationError)
      if (caught instanceof ConfigurationError) {
        expect(caught.details?.errors).toContain('container: Required')
      }
    })
  })

  describe('YAML files', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'blobvfs-config-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should load and validate a YAML file', () => {
      const file = join(dir, 'blobvfs.yaml')
      writeFileSync(
        file,
        ['backend: inmemory', 'container: registry', 'rootDirectory: /docker', 'logging:', '  level: warn', ''].join('\n')
      )

      const config = loadConfig(file)

      expect(config.rootDirectory).toBe('/docker')
      expect(config.logging).toEqual({ level: 'warn', pretty: false })
    })

    it('should fail for a missing file', () => {
      expect(() => loadConfig(join(dir, 'absent.yaml'))).toThrow(/Config file not found/)
      expect(loadConfigSafe(join(dir, 'absent.yaml')).success).toBe(false)
    })

    it('should report schema errors without throwing', () => {
      const file = join(dir, 'bad.yaml')
      writeFileSync(file, 'backend: inmemory\nmaxChunkSize: -1\n')

      const result = loadConfigSafe(file)

      expect(result.success).toBe(false)
      if (!result.success) {
        expect(result.errors).toContain('container: Required')
      }
    })

    it('should prefer BLOBVFS_CONFIG_PATH over the environment', () => {
      const file = join(dir, 'explicit.yaml')
      writeFileSync(file, 'backend: inmemory\ncontainer: from-file\n')

      const config = loadConfigAuto({ BLOBVFS_CONFIG_PATH: file, AZURE_STORAGE_CONTAINER: 'from-env' })

      expect(config.container).toBe('from-file')
    })
  })

  describe('resolveAzureCredentials', () => {
    it('should prefer a connection string', () => {
      const config = validateConfig({
        container: 'c',
        azure: { connectionString: 'UseDevelopmentStorage=true', accountUrl: 'https://acct.blob.core.windows.net' },
      })

      expect(resolveAzureCredentials(config)).toEqual({ connectionString: 'UseDevelopmentStorage=true' })
    })

    it('should fall back to the account URL', () => {
      const config = validateConfig({ container: 'c', azure: { accountUrl: 'https://acct.blob.core.windows.net' } })

      expect(resolveAzureCredentials(config)).toEqual({ accountUrl: 'https://acct.blob.core.windows.net' })
    })
  })

  describe('createDriver', () => {
    it('should create the container when configured to', async () => {
      const store = new InMemoryBlobStore()
      const config = validateConfig({
        backend: 'inmemory',
        container: 'registry',
        maxChunkSize: 1024,
        logging: { level: 'silent' },
      })

      const driver = await createDriver(config, store)

      expect(store.isContainerCreated()).toBe(true)
      expect(driver.maxChunkSize).toBe(1024)
    })

    it('should skip container creation when disabled', async () => {
      const store = new InMemoryBlobStore()
      const config = validateConfig({
        backend: 'inmemory',
        container: 'registry',
        createContainer: false,
        logging: { level: 'silent' },
      })

      await createDriver(config, store)

      expect(store.isContainerCreated()).toBe(false)
    })

    it('should build an in-memory store from config', async () => {
      const config = validateConfig({ backend: 'inmemory', container: 'registry', logging: { level: 'silent' } })
      const driver = await createDriver(config)

      await driver.putContent('/hello', Buffer.from('world'))

      expect((await driver.getContent('/hello')).toString()).toBe('world')
    })
  })
})
