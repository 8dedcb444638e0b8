import { z } from 'zod';

/**
 * Schema for the subset of `smartctl --json` output the SMART subsystem reads.
 * Unknown keys are ignored so newer smartctl releases still validate.
 */

export const SmartctlMessageSchema = z.object({
  string: z.string(),
  severity: z.string().optional(),
});

export const AtaSmartAttributeSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  value: z.number(),
  worst: z.number(),
  thresh: z.number(),
  when_failed: z.string().default(''),
  flags: z
    .object({
      value: z.number().int(),
      string: z.string().optional(),
      prefailure: z.boolean().optional(),
      updated_online: z.boolean().optional(),
    })
    .optional(),
  raw: z.object({
    value: z.number(),
    string: z.string(),
  }),
});

export const NvmeHealthLogSchema = z.object({
  critical_warning: z.number().optional(),
  temperature: z.number().optional(),
  available_spare: z.number().optional(),
  available_spare_threshold: z.number().optional(),
  percentage_used: z.number().optional(),
  data_units_read: z.number().optional(),
  data_units_written: z.number().optional(),
  host_reads: z.number().optional(),
  host_writes: z.number().optional(),
  controller_busy_time: z.number().optional(),
  power_cycles: z.number().optional(),
  power_on_hours: z.number().optional(),
  unsafe_shutdowns: z.number().optional(),
  media_errors: z.number().optional(),
  num_err_log_entries: z.number().optional(),
  warning_temp_time: z.number().optional(),
  critical_comp_time: z.number().optional(),
});

export const SmartctlReportSchema = z.object({
  smartctl: z.object({
    exit_status: z.number().int(),
    messages: z.array(SmartctlMessageSchema).optional(),
  }),
  device: z
    .object({
      name: z.string(),
      type: z.string().optional(),
      protocol: z.string().optional(),
    })
    .optional(),
  smart_support: z
    .object({
      available: z.boolean().optional(),
      enabled: z.boolean().optional(),
    })
    .optional(),
  smart_status: z.object({ passed: z.boolean() }).optional(),
  temperature: z.object({ current: z.number().optional() }).optional(),
  ata_smart_attributes: z
    .object({
      table: z.array(AtaSmartAttributeSchema),
    })
    .optional(),
  nvme_smart_health_information_log: NvmeHealthLogSchema.optional(),
});

export type SmartctlMessage = z.infer<typeof SmartctlMessageSchema>;
export type AtaSmartAttributeEntry = z.infer<typeof AtaSmartAttributeSchema>;
export type NvmeHealthLog = z.infer<typeof NvmeHealthLogSchema>;
export type SmartctlReport = z.infer<typeof SmartctlReportSchema>;
