/**
 * The slice of WebGPU the texture kernel drives. A real `GPUDevice` satisfies
 * `TextureGpuDevice`; opaque handles the kernel only passes back to the device
 * (views, layouts, bind groups, command buffers) are plain objects.
 */

export type GpuExtent = {
  width: number;
  height?: number;
  depthOrArrayLayers?: number;
};

export type GpuCompilationMessage = {
  readonly type: GPUCompilationMessageType;
  readonly message: string;
  readonly lineNum: number;
  readonly linePos: number;
};

export interface GpuShaderModule {
  getCompilationInfo(): Promise<{ readonly messages: ReadonlyArray<GpuCompilationMessage> }>;
}

export interface GpuComputePipeline {
  getBindGroupLayout(index: number): object;
}

export interface GpuTexture {
  createView(): object;
  destroy(): void;
}

export interface GpuBuffer {
  mapAsync(mode: number, offset?: number, size?: number): Promise<void>;
  getMappedRange(offset?: number, size?: number): ArrayBuffer;
  unmap(): void;
  destroy(): void;
}

export type GpuTextureCopy = {
  texture: GpuTexture;
};

export type GpuBufferCopy = {
  buffer: GpuBuffer;
  offset?: number;
  bytesPerRow?: number;
  rowsPerImage?: number;
};

export type GpuDataLayout = {
  offset?: number;
  bytesPerRow?: number;
  rowsPerImage?: number;
};

export interface GpuComputePass {
  setPipeline(pipeline: GpuComputePipeline): void;
  setBindGroup(index: number, bindGroup: object | null): void;
  dispatchWorkgroups(x: number, y?: number, z?: number): void;
  end(): void;
}

export interface GpuCommandEncoder {
  beginComputePass(descriptor?: { label?: string }): GpuComputePass;
  copyTextureToBuffer(source: GpuTextureCopy, destination: GpuBufferCopy, size: GpuExtent): void;
  finish(): object;
}

export interface GpuQueue {
  writeTexture(
    destination: GpuTextureCopy,
    data: BufferSource,
    dataLayout: GpuDataLayout,
    size: GpuExtent,
  ): void;
  submit(commandBuffers: Iterable<object>): void;
}

export interface TextureGpuDevice {
  readonly queue: GpuQueue;
  createShaderModule(descriptor: { label?: string; code: string }): GpuShaderModule;
  createComputePipelineAsync(descriptor: {
    label?: string;
    layout: 'auto' | object;
    compute: { module: GpuShaderModule; entryPoint?: string };
  }): Promise<GpuComputePipeline>;
  createTexture(descriptor: {
    label?: string;
    size: GpuExtent;
    format: GPUTextureFormat;
    usage: number;
  }): GpuTexture;
  createBuffer(descriptor: { label?: string; size: number; usage: number }): GpuBuffer;
  createBindGroup(descriptor: {
    label?: string;
    layout: object;
    entries: Iterable<{ binding: number; resource: object }>;
  }): object;
  createCommandEncoder(descriptor?: { label?: string }): GpuCommandEncoder;
  destroy(): void;
}
