export type DeviceRecord = {
  id: string;
  name: string;
  location: string | null;
  model: string | null;
  manufacturer: string | null;
  serial_number: string | null;
  external_device_id: string | null;
  timezone: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
};

export type CreateDeviceInput = {
  name: string;
  location?: string | null;
  model?: string | null;
  manufacturer?: string | null;
  serial_number?: string | null;
  external_device_id?: string | null;
  timezone?: string;
};

export type UpdateDeviceInput = {
  name?: string;
  location?: string | null;
  model?: string | null;
  manufacturer?: string | null;
  serial_number?: string | null;
  external_device_id?: string | null;
  timezone?: string;
  is_active?: boolean;
};
