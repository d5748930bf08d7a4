import { DecodeError } from '../errors.js';
import { Tensor, dtypeCode, dtypeFromCode } from '../registers/tensor.js';
import { ByteReader, ByteWriter } from './bytes.js';

// dtype u8 | rank u8 | dims u32 × rank | elements LE (f32/i32: 4 bytes, f64: 8 bytes)

export function writeTensor(out: ByteWriter, tensor: Tensor): void {
  out.u8(dtypeCode(tensor.dtype)).u8(tensor.rank);
  for (const d of tensor.shape) out.u32(d);
  const data = tensor.data;
  for (let i = 0; i < data.length; i++) {
    switch (tensor.dtype) {
      case 'f32':
        out.f32(data[i]);
        break;
      case 'f64':
        out.f64(data[i]);
        break;
      case 'i32':
        out.i32(data[i]);
        break;
    }
  }
}

export function readTensor(reader: ByteReader): Tensor {
  const dtype = dtypeFromCode(reader.u8('tensor dtype'));
  const rank = reader.u8('tensor rank');
  if (rank === 0) throw new DecodeError('tensor rank must be at least 1');
  const shape: number[] = [];
  for (let i = 0; i < rank; i++) shape.push(reader.u32('tensor dimension'));
  const size = shape.reduce((n, d) => n * d, 1);
  const width = dtype === 'f64' ? 8 : 4;
  if (size * width > reader.remaining) {
    throw new DecodeError(`tensor of ${size} elements needs ${size * width} bytes, have ${reader.remaining}`, { size });
  }
  const values: number[] = [];
  for (let i = 0; i < size; i++) {
    values.push(dtype === 'f64' ? reader.f64() : dtype === 'f32' ? reader.f32() : reader.i32());
  }
  return Tensor.from(shape, values, dtype);
}

export function encodeTensor(tensor: Tensor): Uint8Array {
  const out = new ByteWriter();
  writeTensor(out, tensor);
  return out.finish();
}

export function decodeTensor(bytes: Uint8Array): Tensor {
  const reader = new ByteReader(bytes);
  const tensor = readTensor(reader);
  if (reader.remaining !== 0) {
    throw new DecodeError(`${reader.remaining} trailing bytes after tensor`, { trailing: reader.remaining });
  }
  return tensor;
}
