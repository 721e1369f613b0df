/**
 * Memory Configuration
 * Limits applied to DOCX packages before they are unpacked and parsed
 */

export const memoryConfig = {
  /**
   * Maximum size of an uploaded .docx package (50MB)
   */
  maxUploadFileSize: parseInt(process.env.MAX_UPLOAD_FILE_SIZE || '52428800', 10),

  /**
   * Maximum size of word/document.xml once unpacked (10MB)
   */
  maxXmlMemorySize: parseInt(process.env.MAX_XML_MEMORY_SIZE || '10485760', 10),

  /**
   * Maximum number of entries in a .docx archive
   */
  maxZipEntries: 1000,

  /**
   * Enable memory monitoring logs
   */
  enableMemoryLogging: process.env.ENABLE_MEMORY_LOGGING === 'true',
};

/**
 * Get current memory usage stats
 */
export function getMemoryUsage(): {
  heapUsed: number;
  heapTotal: number;
  heapUsedMB: number;
  heapTotalMB: number;
} {
  const usage = process.memoryUsage();
  return {
    heapUsed: usage.heapUsed,
    heapTotal: usage.heapTotal,
    heapUsedMB: Math.round(usage.heapUsed / 1024 / 1024),
    heapTotalMB: Math.round(usage.heapTotal / 1024 / 1024),
  };
}
